import type { ContentProvider } from './types.js';

/**
 * Typed helper for provider definitions.
 * Keeps provider declarations consistent without runtime overhead.
 */
export function defineProvider<T extends ContentProvider>(provider: T): T {
  return provider;
}
