import type { ParsedJob } from '@jobsift/source-sdk';
import { isNavigationArtifact, isSearchLink } from '../artifacts.js';
import { buildJob, dedupeByTitle } from '../build.js';
import { splitPosting } from '../split.js';
import { collectText, parseHtml } from '../text.js';

const JOB_LINK_SELECTOR = "a[href*='indeed.com']";
const JOB_HREF_MARKERS = ['/viewjob', '/rc/clk', 'jk='] as const;

function isJobHref(href: string): boolean {
  return JOB_HREF_MARKERS.some((marker) => href.includes(marker));
}

export function extractIndeed(body: string): ParsedJob[] {
  const root = parseHtml(body);
  const jobs: ParsedJob[] = [];

  for (const anchor of root.querySelectorAll(JOB_LINK_SELECTOR)) {
    const href = anchor.getAttribute('href') ?? '';
    const text = collectText(anchor);
    if (!text || isNavigationArtifact(text) || isSearchLink(href) || !isJobHref(href)) {
      continue;
    }

    const job = buildJob({ ...splitPosting(text), href, rawText: text, source: 'indeed' });
    if (job) jobs.push(job);
  }

  return dedupeByTitle(jobs);
}
