import type { ParsedJob, RawContent } from '@jobsift/source-sdk';
import { extractGenericEmail } from './sources/generic.js';
import { extractIndeed } from './sources/indeed.js';
import { extractLinkedIn } from './sources/linkedin.js';
import { extractPosting } from './sources/page.js';

/**
 * Turn one raw content item into candidate postings. Never throws for missing data; content
 * with nothing recognizable yields an empty list.
 */
export function extract(content: RawContent): ParsedJob[] {
  switch (content.source) {
    case 'linkedin':
      return extractLinkedIn(content.body);
    case 'indeed':
      return extractIndeed(content.body);
    case 'email-generic':
      return extractGenericEmail(content.body);
    case 'scrape':
      return extractPosting(content.body, content.source, content.url);
  }
}
