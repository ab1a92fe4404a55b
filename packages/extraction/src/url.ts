import { IDENTITY_QUERY_PARAMS } from './rules.js';

/**
 * Strip click-tracking decoration from a posting URL so it can serve as a dedup key.
 * The fragment and every query parameter go, except those naming the posting itself.
 */
export function canonicalizeJobUrl(url: string): string | undefined {
  const trimmed = url.trim();
  if (!trimmed) return undefined;

  const withoutFragment = trimmed.split('#', 1)[0] ?? '';
  const queryIdx = withoutFragment.indexOf('?');
  if (queryIdx === -1) {
    return withoutFragment || undefined;
  }

  const base = withoutFragment.slice(0, queryIdx);
  const kept = new URLSearchParams();
  for (const [key, value] of new URLSearchParams(withoutFragment.slice(queryIdx + 1))) {
    if (IDENTITY_QUERY_PARAMS.has(key)) {
      kept.append(key, value);
    }
  }

  const query = kept.toString();
  const canonical = query ? `${base}?${query}` : base;
  return canonical || undefined;
}
