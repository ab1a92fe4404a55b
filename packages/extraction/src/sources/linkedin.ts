import type { ParsedJob } from '@jobsift/source-sdk';
import { isNavigationArtifact, isSearchLink } from '../artifacts.js';
import { buildJob, dedupeByTitle } from '../build.js';
import { parseLinkedInLayout, splitPosting } from '../split.js';
import { collectText, parseHtml } from '../text.js';
import { bodyText, extractJobsFromText } from './generic.js';

const JOB_LINK_SELECTOR = "a[href*='linkedin.com/comm/jobs']";

/**
 * LinkedIn job-alert email. Each job card links to `linkedin.com/comm/jobs/view/<id>` with
 * `Title   Employer · Location` as link text. When no card yields a job the body is scanned
 * as free text.
 */
export function extractLinkedIn(body: string): ParsedJob[] {
  const root = parseHtml(body);
  const jobs: ParsedJob[] = [];

  for (const anchor of root.querySelectorAll(JOB_LINK_SELECTOR)) {
    const href = anchor.getAttribute('href') ?? '';
    const text = collectText(anchor);
    if (!text || isNavigationArtifact(text) || isSearchLink(href)) {
      continue;
    }

    const header = parseLinkedInLayout(text) ?? splitPosting(text);
    const job = buildJob({ ...header, href, rawText: text, source: 'linkedin' });
    if (job) jobs.push(job);
  }

  if (jobs.length === 0) {
    return extractJobsFromText(bodyText(body), 'linkedin');
  }

  return dedupeByTitle(jobs);
}
