/**
 * Phrase and label tables used by the extractors. Kept in one place so the heuristics can be
 * audited and tested without reading the code that applies them.
 */

/** Elements dropped together with everything inside them. */
export const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'svg', 'path']);

/** Elements rendered as a line of their own. */
export const BLOCK_TAGS = new Set(['p', 'div', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6']);

/** Substrings that betray inlined page state or bundler output. */
export const SCRIPT_SIGNATURES = ['window.__', 'webpack', 'module_cache', '__como_'] as const;

/** Direct text longer than this is checked for {@link SCRIPT_SIGNATURES}. */
export const SCRIPT_TEXT_MIN_LENGTH = 50;

/**
 * Only elements whose full text is shorter than this are dropped for containing a UI noise
 * phrase; a long description that mentions one in passing survives.
 */
export const NOISE_SCAN_MAX_LENGTH = 500;

/** Lower-case UI chrome phrases from job boards. */
export const UI_NOISE_PHRASES = [
  'set alert for similar jobs',
  'tailor my resume',
  'show premium insights',
  'try premium for',
  'am i a good fit for this job',
  'how can i best position myself',
  'see how you compare to',
  'exclusive job seeker insights',
  'help me stand out',
] as const;

/** Markers after which a page stops being about the job. Tested in this order. */
export const END_OF_CONTENT_MARKERS = [
  '… more',
  'More jobs',
  'Looking for talent?',
  'Actively reviewing applicants',
  'LinkedIn Corporation ©',
  'Select language',
] as const;

/** Lower-case phrases meaning the posting no longer takes applications. */
export const CLOSURE_PHRASES = [
  'no longer accepting applications',
  'this position has been filled',
  'application window has closed',
  'this job is no longer available',
  'this job has expired',
  'position is no longer available',
  'applications are closed',
  'this posting has closed',
] as const;

/** Labels that precede a requisition identifier, tried in order. */
export const JOB_CODE_LABELS = [
  'job id:',
  'job code:',
  'requisition id:',
  'req id:',
  'req#:',
  'req #:',
  'job #:',
  'job number:',
  'job no:',
  'reference:',
  'ref:',
] as const;

export const MAX_JOB_CODE_LENGTH = 50;

/** Link texts that are exactly one of these (case-insensitive) are navigation. */
export const NAVIGATION_EXACT = ['jobs', 'search for jobs', 'see all jobs', 'view all', 'search other jobs'] as const;

export const NAVIGATION_PREFIXES = ['jobs similar to', 'jobs in ', 'manage job'] as const;

export const NAVIGATION_SUBSTRINGS = ['unsubscribe', 'privacy'] as const;

export const MIN_POSTING_TEXT_LENGTH = 10;

export const SEARCH_LINK_MARKERS = ['/jobs/search', '/search?', '/jobs/alerts'] as const;

/** Call-to-action texts that ended up stored as titles. */
export const STORED_ARTIFACT_PHRASES = [
  'view this job',
  'view job',
  'apply now',
  'see more',
  'view all',
  'click here',
  'learn more',
  'read more',
  'get started',
  'sign in',
  'log in',
  'unsubscribe',
] as const;

export const MIN_STORED_TITLE_LENGTH = 5;

/** Stored titles at least this long are never treated as call-to-action artifacts. */
export const STORED_ARTIFACT_MAX_LENGTH = 50;

/** Query parameters that identify the posting itself rather than the click. */
export const IDENTITY_QUERY_PARAMS = new Set(['jk']);

/** Scanned dollar amounts above this are funding or revenue figures, not pay. */
export const MAX_ANNUAL_PAY = 10_000_000;

/** Working hours per year used to annualize hourly pay. */
export const HOURS_PER_YEAR = 2080;
