import type { ContentSource, ParsedJob } from '@jobsift/source-sdk';
import { buildJob, dedupeByTitle } from '../build.js';
import { cleanHtml } from '../clean.js';
import { looksLikeHtml, normalizeLines } from '../text.js';

const ENGINEERING_TITLE =
  /(senior|staff|principal|lead|junior|sr\.?|jr\.?)?\s*(software|devops|platform|infrastructure|site reliability|sre|cloud|backend|frontend|full[- ]?stack|data|ml|machine learning)\s*(engineer|developer|architect|manager|lead|specialist)/gi;

const MIN_TITLE_LENGTH = 6;
const RAW_TEXT_LIMIT = 500;

/**
 * Plain text of an HTML or text body.
 */
export function bodyText(body: string): string {
  return looksLikeHtml(body) ? cleanHtml(body) : normalizeLines(body);
}

/**
 * Scan free text for engineering job titles. Employer and URL are unknown; pay and closure
 * are read from the whole text and shared by every match.
 */
export function extractJobsFromText(text: string, source: ContentSource): ParsedJob[] {
  const rawText = text.slice(0, RAW_TEXT_LIMIT);
  const jobs: ParsedJob[] = [];

  for (const match of text.matchAll(ENGINEERING_TITLE)) {
    const title = match[0].trim();
    if (title.length < MIN_TITLE_LENGTH) continue;

    const job = buildJob({ title, rawText, scanText: text, source });
    if (job) jobs.push(job);
  }

  return dedupeByTitle(jobs);
}

export function extractGenericEmail(body: string): ParsedJob[] {
  return extractJobsFromText(bodyText(body), 'email-generic');
}
