import { describe, it, expect } from 'vitest';
import { detectClosed } from '../src/closed.js';
import { canonicalizeJobUrl } from '../src/url.js';

describe('detectClosed', () => {
  it('detects closure phrases in any case', () => {
    expect(detectClosed('No longer accepting applications')).toBe(true);
    expect(detectClosed('THIS POSITION HAS BEEN FILLED.')).toBe(true);
  });

  it('returns false for open postings', () => {
    expect(detectClosed('Apply today')).toBe(false);
  });
});

describe('canonicalizeJobUrl', () => {
  it('drops tracking parameters and fragment', () => {
    expect(canonicalizeJobUrl('https://www.linkedin.com/comm/jobs/view/123/?trackingId=abc&refId=x#frag')).toBe(
      'https://www.linkedin.com/comm/jobs/view/123/',
    );
  });

  it('keeps the Indeed posting key', () => {
    expect(canonicalizeJobUrl('https://www.indeed.com/viewjob?jk=abc123&from=alert&tk=xyz')).toBe(
      'https://www.indeed.com/viewjob?jk=abc123',
    );
  });

  it('trims whitespace', () => {
    expect(canonicalizeJobUrl('  https://example.com/jobs/1  ')).toBe('https://example.com/jobs/1');
  });

  it('returns undefined for empty input', () => {
    expect(canonicalizeJobUrl('')).toBeUndefined();
    expect(canonicalizeJobUrl('   ')).toBeUndefined();
  });
});
