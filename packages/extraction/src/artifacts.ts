import {
  MIN_POSTING_TEXT_LENGTH,
  MIN_STORED_TITLE_LENGTH,
  NAVIGATION_EXACT,
  NAVIGATION_PREFIXES,
  NAVIGATION_SUBSTRINGS,
  SEARCH_LINK_MARKERS,
  STORED_ARTIFACT_MAX_LENGTH,
  STORED_ARTIFACT_PHRASES,
} from './rules.js';

const NAVIGATION_EXACT_SET = new Set<string>(NAVIGATION_EXACT);

/**
 * True for link text that is UI chrome rather than a posting: too short, a known navigation
 * label, an unsubscribe/privacy link, or a search-results link such as "Engineering Manager jobs".
 */
export function isNavigationArtifact(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed.length < MIN_POSTING_TEXT_LENGTH) {
    return true;
  }

  const lower = trimmed.toLowerCase();
  if (NAVIGATION_EXACT_SET.has(lower)) {
    return true;
  }

  if (
    NAVIGATION_PREFIXES.some((prefix) => lower.startsWith(prefix)) ||
    NAVIGATION_SUBSTRINGS.some((fragment) => lower.includes(fragment))
  ) {
    return true;
  }

  // "jobs" only counts as a suffix; titles may carry it mid-string.
  return trimmed.endsWith(' jobs') || trimmed.endsWith(' Jobs');
}

export function isSearchLink(url: string): boolean {
  return SEARCH_LINK_MARKERS.some((marker) => url.includes(marker));
}

/**
 * Stored titles that are leftovers of call-to-action links ("Apply now", "View job").
 */
export function isStoredArtifactTitle(title: string): boolean {
  if (title.length < MIN_STORED_TITLE_LENGTH) {
    return true;
  }

  const lower = title.toLowerCase();
  return lower.length < STORED_ARTIFACT_MAX_LENGTH && STORED_ARTIFACT_PHRASES.some((phrase) => lower.includes(phrase));
}
