import type { ContentSource, ParsedJob } from '@jobsift/source-sdk';
import { detectClosed } from './closed.js';
import { extractJobCode } from './job-code.js';
import { extractPayRange } from './pay.js';
import { canonicalizeJobUrl } from './url.js';

export interface PostingFields {
  title: string;
  employer?: string;
  location?: string;
  /** Link the posting was found under, before canonicalization. */
  href?: string;
  rawText: string;
  /** Text scanned for pay, job code and closure. Defaults to `rawText`. */
  scanText?: string;
  source: ContentSource;
}

/**
 * Assemble a ParsedJob from split header fields, deriving pay, job code, closed flag and
 * canonical URL. Returns undefined when the title is blank.
 */
export function buildJob(fields: PostingFields): ParsedJob | undefined {
  const title = fields.title.trim();
  if (!title) return undefined;

  const scanText = fields.scanText ?? fields.rawText;
  const pay = extractPayRange(scanText);
  const jobCode = extractJobCode(scanText) ?? (fields.href ? extractJobCode(fields.href) : undefined);

  return {
    title,
    employer: fields.employer?.trim() || undefined,
    location: fields.location?.trim() || undefined,
    url: fields.href ? canonicalizeJobUrl(fields.href) : undefined,
    payMin: pay.min,
    payMax: pay.max,
    jobCode,
    noLongerAccepting: detectClosed(scanText),
    source: fields.source,
    rawText: fields.rawText,
  };
}

/**
 * Keep the first record for each lower-cased title.
 */
export function dedupeByTitle(jobs: ParsedJob[]): ParsedJob[] {
  const seen = new Set<string>();
  return jobs.filter((job) => {
    const key = job.title.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
