/**
 * Treat a partial fake as the full type. Only for tests that touch the listed members.
 */
export function stub<T>(partial: Partial<T>): T {
  return partial as T;
}
