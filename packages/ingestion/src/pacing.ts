/** Fraction of the base delay added or removed at random. */
export const JITTER_RATIO = 0.2;

/**
 * Spread a delay uniformly over ±20% so that fetches from the same host do not line up.
 */
export function addJitter(baseMs: number, random: () => number = Math.random): number {
  const spread = baseMs * JITTER_RATIO;
  return Math.max(0, Math.round(baseMs - spread + random() * spread * 2));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
