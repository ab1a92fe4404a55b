import { describe, it, expect } from 'vitest';
import { extract } from '../src/extract.js';
import { extractPosting } from '../src/sources/page.js';

const LINKEDIN_ALERT = `
<table>
  <tr><td><a href="https://www.linkedin.com/comm/jobs/view/3901234567/?trackingId=abc">Staff DevOps Engineer, DevInfra             SandboxAQ · United States (Remote)</a></td></tr>
  <tr><td><a href="https://www.linkedin.com/comm/jobs/view/3907654321/?trackingId=def">Platform Engineer   Acme · Austin, TX</a></td></tr>
  <tr><td><a href="https://www.linkedin.com/comm/jobs/view/3907654322/">platform engineer   Initech · Remote</a></td></tr>
  <tr><td><a href="https://www.linkedin.com/comm/jobs/search?keywords=devops">Search for jobs</a></td></tr>
  <tr><td><a href="https://www.linkedin.com/comm/jobs/alerts">Manage job alerts</a></td></tr>
</table>`;

describe('extract', () => {
  describe('linkedin', () => {
    it('reads job cards and skips navigation', () => {
      const jobs = extract({ source: 'linkedin', body: LINKEDIN_ALERT });

      expect(jobs).toHaveLength(2);
      expect(jobs[0]).toMatchObject({
        title: 'Staff DevOps Engineer, DevInfra',
        employer: 'SandboxAQ',
        location: 'United States (Remote)',
        url: 'https://www.linkedin.com/comm/jobs/view/3901234567/',
        jobCode: 'linkedin-3901234567',
        noLongerAccepting: false,
        source: 'linkedin',
      });
      expect(jobs[0]!.payMin).toBeUndefined();
      expect(jobs[1]).toMatchObject({ title: 'Platform Engineer', employer: 'Acme', location: 'Austin, TX' });
    });

    it('falls back to scanning the text', () => {
      const jobs = extract({
        source: 'linkedin',
        body: '<p>We are hiring a Senior Software Engineer and a Staff Platform Engineer.</p>',
      });

      expect(jobs.map((job) => job.title)).toEqual(['Senior Software Engineer', 'Staff Platform Engineer']);
      expect(jobs[0]!.employer).toBeUndefined();
      expect(jobs[0]!.rawText).toBe('We are hiring a Senior Software Engineer and a Staff Platform Engineer.');
    });

    it('returns nothing when no title is found', () => {
      expect(extract({ source: 'linkedin', body: '<p>Hello</p>' })).toEqual([]);
    });
  });

  describe('indeed', () => {
    it('keeps only posting links', () => {
      const body = `
        <a href="https://www.indeed.com/rc/clk?jk=abc123&amp;from=ja">Backend Developer - Initech</a>
        <a href="https://www.indeed.com/jobs?q=backend&amp;l=remote">Backend Developer jobs in Remote</a>
        <a href="https://www.indeed.com/cmp/Initech">Initech company reviews</a>`;

      const jobs = extract({ source: 'indeed', body });

      expect(jobs).toHaveLength(1);
      expect(jobs[0]).toMatchObject({
        title: 'Backend Developer',
        employer: 'Initech',
        url: 'https://www.indeed.com/rc/clk?jk=abc123',
        source: 'indeed',
      });
      expect(jobs[0]!.jobCode).toBeUndefined();
    });
  });

  describe('email-generic', () => {
    it('scans cleaned text for titles with shared pay and closure', () => {
      const body =
        '<div><p>Hi there,</p><p>We need a Senior Site Reliability Engineer ($150K - $190K).</p>' +
        '<p>No longer accepting applications for the Junior Data Analyst role.</p></div>';

      const jobs = extract({ source: 'email-generic', body });

      expect(jobs).toHaveLength(1);
      expect(jobs[0]).toMatchObject({
        title: 'Senior Site Reliability Engineer',
        payMin: 150000,
        payMax: 190000,
        noLongerAccepting: true,
        source: 'email-generic',
      });
    });
  });

  describe('scrape', () => {
    it('reads one posting from a page', () => {
      const body =
        '<h1>Senior Backend Engineer at Globex</h1><p>Job ID: GX-4411</p>' +
        '<ul><li>Pay: $140,000 - $170,000</li></ul><p>More jobs</p><p>Junior role</p>';

      const jobs = extract({ source: 'scrape', body, url: 'https://careers.globex.example/jobs/4411?utm_source=board#apply' });

      expect(jobs).toEqual([
        {
          title: 'Senior Backend Engineer',
          employer: 'Globex',
          location: undefined,
          url: 'https://careers.globex.example/jobs/4411',
          payMin: 140000,
          payMax: 170000,
          jobCode: 'GX-4411',
          noLongerAccepting: false,
          source: 'scrape',
          rawText: 'Senior Backend Engineer at Globex\nJob ID: GX-4411\n• Pay: $140,000 - $170,000',
        },
      ]);
    });

    it('returns nothing for blank content', () => {
      expect(extract({ source: 'scrape', body: '   ' })).toEqual([]);
    });
  });
});

describe('extractPosting', () => {
  it('does not take funding figures for pay', () => {
    const [job] = extractPosting('Data Engineer at Acme\nWe raised $3,000,000,000 last year.', 'scrape');

    expect(job).toMatchObject({ title: 'Data Engineer', employer: 'Acme' });
    expect(job!.payMin).toBeUndefined();
    expect(job!.payMax).toBeUndefined();
  });

  it('keeps a posting whose LinkedIn id is too long for a job code', () => {
    const jobs = extract({
      source: 'linkedin',
      body: `<a href="https://www.linkedin.com/comm/jobs/view/${'1'.repeat(45)}/">Platform Engineer   Acme · Remote</a>`,
    });

    expect(jobs).toHaveLength(1);
    expect(jobs[0]!.jobCode).toBeUndefined();
  });

  it('caps long titles', () => {
    const [job] = extractPosting('x'.repeat(120), 'scrape');
    expect(job!.title).toBe(`${'x'.repeat(97)}...`);
  });
});
