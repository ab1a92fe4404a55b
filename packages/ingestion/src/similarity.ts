const WINKLER_PREFIX_LIMIT = 4;
const WINKLER_SCALE = 0.1;
/** The prefix boost only applies to pairs already this similar. */
export const WINKLER_BOOST_THRESHOLD = 0.7;

/**
 * Jaro similarity in [0, 1]. Characters match when equal and no further apart than half the
 * longer string's length, minus one.
 */
export function jaro(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatched = new Uint8Array(a.length);
  const bMatched = new Uint8Array(b.length);
  let matches = 0;

  for (let i = 0; i < a.length; i++) {
    const lo = Math.max(0, i - window);
    const hi = Math.min(i + window + 1, b.length);
    for (let j = lo; j < hi; j++) {
      if (bMatched[j] || a[i] !== b[j]) continue;
      aMatched[i] = 1;
      bMatched[j] = 1;
      matches++;
      break;
    }
  }

  if (matches === 0) return 0;

  let mismatches = 0;
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatched[i]) continue;
    while (!bMatched[k]) k++;
    if (a[i] !== b[k]) mismatches++;
    k++;
  }

  const transpositions = mismatches / 2;
  return (matches / a.length + matches / b.length + (matches - transpositions) / matches) / 3;
}

/**
 * Jaro-Winkler similarity: Jaro boosted by up to four leading characters in common, once Jaro
 * exceeds {@link WINKLER_BOOST_THRESHOLD}.
 */
export function jaroWinkler(a: string, b: string): number {
  const base = jaro(a, b);
  if (base <= WINKLER_BOOST_THRESHOLD) {
    return base;
  }

  let prefix = 0;
  const limit = Math.min(WINKLER_PREFIX_LIMIT, a.length, b.length);
  while (prefix < limit && a[prefix] === b[prefix]) {
    prefix++;
  }

  return Math.min(1, base + prefix * WINKLER_SCALE * (1 - base));
}
