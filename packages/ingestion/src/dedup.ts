import type { ExistingRecordView } from '@jobsift/source-sdk';
import { jaroWinkler } from './similarity.js';

/** Titles scoring strictly above this are the same posting. */
export const FUZZY_TITLE_THRESHOLD = 0.8;

export type DuplicateRule = 'url' | 'exact-title' | 'title-substring' | 'fuzzy-title';

export interface DuplicateCandidate {
  title: string;
  employer?: string;
  url?: string;
}

export interface DuplicateMatch {
  id: string;
  rule: DuplicateRule;
}

export interface DuplicatePair {
  originalId: string;
  duplicateId: string;
  rule: DuplicateRule;
  reason: string;
}

type TitleRule = {
  rule: Exclude<DuplicateRule, 'url'>;
  matches: (a: string, b: string) => boolean;
};

const TITLE_RULES: TitleRule[] = [
  { rule: 'exact-title', matches: (a, b) => a === b },
  {
    rule: 'title-substring',
    matches: (a, b) => a.length > 0 && b.length > 0 && (a.includes(b) || b.includes(a)),
  },
  { rule: 'fuzzy-title', matches: (a, b) => jaroWinkler(a, b) > FUZZY_TITLE_THRESHOLD },
];

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

function sameEmployer(a: string | undefined, b: string | undefined): boolean {
  if (!a || !b) return false;
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function sameUrl(a: string | undefined, b: string | undefined): boolean {
  return !!a && a === b;
}

/**
 * Decide whether `candidate` is already in `corpus`.
 *
 * A URL hit anywhere in the corpus wins. Otherwise records from the same employer are walked in
 * corpus order, and each is tried against the exact, substring and fuzzy title rules; the first
 * record matching any rule is the duplicate. A candidate without an employer can only match by
 * URL.
 */
export function matchDuplicate(candidate: DuplicateCandidate, corpus: ExistingRecordView[]): DuplicateMatch | undefined {
  const byUrl = corpus.find((record) => sameUrl(candidate.url, record.url));
  if (byUrl) {
    return { id: byUrl.id, rule: 'url' };
  }

  const title = normalizeTitle(candidate.title);
  for (const record of corpus) {
    if (!sameEmployer(candidate.employer, record.employer)) continue;

    const other = normalizeTitle(record.title);
    const hit = TITLE_RULES.find(({ matches }) => matches(title, other));
    if (hit) {
      return { id: record.id, rule: hit.rule };
    }
  }

  return undefined;
}

export function findDuplicate(candidate: DuplicateCandidate, corpus: ExistingRecordView[]): string | undefined {
  return matchDuplicate(candidate, corpus)?.id;
}

function matchPair(candidate: ExistingRecordView, original: ExistingRecordView): DuplicateRule | undefined {
  return matchDuplicate(candidate, [original])?.rule;
}

/**
 * Scan stored records (oldest first) for duplicates. Each record is compared with every earlier
 * record that is not itself a duplicate; the first match wins. Pairs are not merged into
 * clusters.
 */
export function findDuplicates(records: ExistingRecordView[]): DuplicatePair[] {
  const pairs: DuplicatePair[] = [];
  const flagged = new Set<string>();

  for (let i = 1; i < records.length; i++) {
    const duplicate = records[i];
    if (!duplicate) continue;

    for (let j = 0; j < i; j++) {
      const original = records[j];
      if (!original || flagged.has(original.id)) continue;

      const rule = matchPair(duplicate, original);
      if (!rule) continue;

      flagged.add(duplicate.id);
      pairs.push({
        originalId: original.id,
        duplicateId: duplicate.id,
        rule,
        reason: `Job #${duplicate.id} ('${duplicate.title}') duplicates job #${original.id} ('${original.title}')`,
      });
      break;
    }
  }

  return pairs;
}
