import { CLOSURE_PHRASES } from './rules.js';

export function detectClosed(text: string): boolean {
  const lower = text.toLowerCase();
  return CLOSURE_PHRASES.some((phrase) => lower.includes(phrase));
}
