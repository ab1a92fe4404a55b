import type { ContentSource, ParsedJob } from '@jobsift/source-sdk';
import { buildJob } from '../build.js';
import { splitPosting } from '../split.js';
import { bodyText } from './generic.js';

const MAX_TITLE_LENGTH = 100;

function capTitle(title: string): string {
  return title.length > MAX_TITLE_LENGTH ? `${title.slice(0, MAX_TITLE_LENGTH - 3)}...` : title;
}

/**
 * A single posting page. The first line of the cleaned text is the header; pay, job code and
 * closure come from the whole page.
 */
export function extractPosting(body: string, source: ContentSource, url?: string): ParsedJob[] {
  const text = bodyText(body);
  const firstLine = text.split('\n', 1)[0] ?? '';
  if (!firstLine) return [];

  const header = splitPosting(firstLine);
  const job = buildJob({ ...header, title: capTitle(header.title), href: url, rawText: text, source });
  return job ? [job] : [];
}
