export { cleanHtml, truncateAtEndMarker } from './clean.js';
export { extractPayRange } from './pay.js';
export type { PayRange } from './pay.js';
export { extractJobCode } from './job-code.js';
export { parseLinkedInLayout, splitPosting } from './split.js';
export type { PostingHeader } from './split.js';
export { isNavigationArtifact, isSearchLink, isStoredArtifactTitle } from './artifacts.js';
export { detectClosed } from './closed.js';
export { canonicalizeJobUrl } from './url.js';
export { buildJob, dedupeByTitle } from './build.js';
export type { PostingFields } from './build.js';
export { extractJobsFromText } from './sources/generic.js';
export { extractPosting } from './sources/page.js';
export { extract } from './extract.js';
