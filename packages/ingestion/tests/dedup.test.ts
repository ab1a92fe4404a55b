import { describe, it, expect } from 'vitest';
import type { ExistingRecordView } from '@jobsift/source-sdk';
import { findDuplicate, findDuplicates, matchDuplicate, normalizeTitle } from '../src/dedup.js';

function record(id: string, title: string, employer?: string, url?: string): ExistingRecordView {
  return { id, title, employer, url };
}

describe('normalizeTitle', () => {
  it('trims and lowercases', () => {
    expect(normalizeTitle('  Senior SRE ')).toBe('senior sre');
  });
});

describe('matchDuplicate', () => {
  it('matches on identical URL regardless of title', () => {
    const corpus = [record('1', 'Infra Engineer', 'Other', 'https://acme.example/jobs/1')];
    expect(matchDuplicate({ title: 'Platform Engineer', url: 'https://acme.example/jobs/1' }, corpus)).toEqual({
      id: '1',
      rule: 'url',
    });
  });

  it('matches abbreviated titles from the same employer', () => {
    const corpus = [record('1', 'Senior Software Engineer', 'Acme')];
    expect(matchDuplicate({ title: 'Sr. Software Engineer', employer: 'Acme' }, corpus)).toEqual({
      id: '1',
      rule: 'fuzzy-title',
    });
  });

  it('treats the same title at different employers as novel', () => {
    const corpus = [record('1', 'Platform Engineer', 'Acme')];
    expect(matchDuplicate({ title: 'Platform Engineer', employer: 'Globex' }, corpus)).toBeUndefined();
  });

  it('compares employers case-insensitively', () => {
    const corpus = [record('1', 'Platform Engineer', 'acme')];
    expect(matchDuplicate({ title: 'platform engineer', employer: ' ACME ' }, corpus)).toEqual({
      id: '1',
      rule: 'exact-title',
    });
  });

  it('matches titles contained in one another', () => {
    const corpus = [record('1', 'Senior Backend Engineer (Payments)', 'Acme')];
    expect(matchDuplicate({ title: 'Backend Engineer', employer: 'Acme' }, corpus)).toEqual({
      id: '1',
      rule: 'title-substring',
    });
  });

  it('returns the earliest same-employer record that matches any title rule', () => {
    const corpus = [record('1', 'Platform Engineers', 'Acme'), record('2', 'Platform Engineer', 'Acme')];
    expect(matchDuplicate({ title: 'Platform Engineer', employer: 'Acme' }, corpus)).toEqual({
      id: '1',
      rule: 'title-substring',
    });
  });

  it('still prefers a URL hit on a later record', () => {
    const corpus = [
      record('1', 'Platform Engineer', 'Acme'),
      record('2', 'Site Reliability Lead', 'Acme', 'https://acme.example/jobs/2'),
    ];
    expect(
      matchDuplicate({ title: 'Platform Engineer', employer: 'Acme', url: 'https://acme.example/jobs/2' }, corpus),
    ).toEqual({ id: '2', rule: 'url' });
  });

  it('keeps distinct titles that only share a prefix', () => {
    const corpus = [record('1', 'Staff Engineer', 'Acme'), record('2', 'Data Architect', 'Acme')];
    expect(matchDuplicate({ title: 'Staff Analyst', employer: 'Acme' }, corpus)).toBeUndefined();
    expect(matchDuplicate({ title: 'Data Analyst', employer: 'Acme' }, corpus)).toBeUndefined();
  });

  it('only matches by URL when the candidate has no employer', () => {
    const corpus = [record('1', 'Platform Engineer', 'Acme')];
    expect(matchDuplicate({ title: 'Platform Engineer' }, corpus)).toBeUndefined();
  });
});

describe('findDuplicate', () => {
  it('returns the matching id', () => {
    const corpus = [record('7', 'Data Engineer', 'Acme')];
    expect(findDuplicate({ title: 'Data Engineer', employer: 'Acme' }, corpus)).toBe('7');
    expect(findDuplicate({ title: 'Data Engineer', employer: 'Globex' }, corpus)).toBeUndefined();
  });
});

describe('findDuplicates', () => {
  it('reports one pair per duplicated record', () => {
    const records = [
      record('1', 'DevOps Engineer', 'Wiraa'),
      record('2', 'DevOps Engineer', 'Wiraa'),
      record('3', 'DevOps Engineer', 'OtherCo'),
    ];

    expect(findDuplicates(records)).toEqual([
      {
        originalId: '1',
        duplicateId: '2',
        rule: 'exact-title',
        reason: "Job #2 ('DevOps Engineer') duplicates job #1 ('DevOps Engineer')",
      },
    ]);
  });

  it('never uses a duplicate as the original', () => {
    const records = [
      record('1', 'SRE Lead', 'Acme'),
      record('2', 'SRE Lead', 'Acme'),
      record('3', 'SRE Lead', 'Acme'),
    ];

    const pairs = findDuplicates(records);
    expect(pairs.map((pair) => [pair.originalId, pair.duplicateId])).toEqual([
      ['1', '2'],
      ['1', '3'],
    ]);
  });

  it('returns nothing for an empty corpus', () => {
    expect(findDuplicates([])).toEqual([]);
  });
});
