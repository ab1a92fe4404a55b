import { describe, it, expect } from 'vitest';
import { parseLinkedInLayout, splitPosting } from '../src/split.js';

describe('parseLinkedInLayout', () => {
  it('splits title, employer and location', () => {
    expect(
      parseLinkedInLayout('Staff DevOps Engineer, DevInfra             SandboxAQ · United States (Remote)'),
    ).toEqual({
      title: 'Staff DevOps Engineer, DevInfra',
      employer: 'SandboxAQ',
      location: 'United States (Remote)',
    });
  });

  it('needs a wide gap before the middot', () => {
    expect(parseLinkedInLayout('Senior Engineer Acme · Remote')).toBeUndefined();
  });

  it('needs a middot', () => {
    expect(parseLinkedInLayout('Senior Engineer    Acme')).toBeUndefined();
  });
});

describe('splitPosting', () => {
  it('prefers the LinkedIn layout', () => {
    expect(splitPosting('Platform Engineer   Acme · Austin, TX')).toEqual({
      title: 'Platform Engineer',
      employer: 'Acme',
      location: 'Austin, TX',
    });
  });

  it('splits on " at "', () => {
    expect(splitPosting('Software Engineer at Google')).toEqual({ title: 'Software Engineer', employer: 'Google' });
  });

  it('splits on the last " - "', () => {
    expect(splitPosting('DevOps Lead - Amazon')).toEqual({ title: 'DevOps Lead', employer: 'Amazon' });
  });

  it('does not treat an engineering tail as employer', () => {
    expect(splitPosting('Staff Engineer - Platform Engineering')).toEqual({
      title: 'Staff Engineer - Platform Engineering',
    });
  });

  it('splits on the last comma', () => {
    expect(splitPosting('Platform Engineer, Stripe')).toEqual({ title: 'Platform Engineer', employer: 'Stripe' });
  });

  it('does not treat a work arrangement as employer', () => {
    expect(splitPosting('Data Engineer, New York, NY (Hybrid)')).toEqual({
      title: 'Data Engineer, New York, NY (Hybrid)',
    });
  });
});
