import { JOB_CODE_LABELS, MAX_JOB_CODE_LENGTH } from './rules.js';

const LINKEDIN_VIEW_PATH = /\/jobs?\/view\/(\d+)/;
const JR_CODE_MIN_LENGTH = 4;
const JR_CODE_MAX_LENGTH = 20;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const LABEL_PATTERNS = JOB_CODE_LABELS.map((label) => new RegExp(escapeRegExp(label), 'i'));

function codeAfterLabel(text: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(text);
  if (!match) return undefined;

  const after = text.slice(match.index + match[0].length);
  const code = /^\s*([A-Za-z0-9_/-]+)/.exec(after)?.[1];
  if (!code || code.length > MAX_JOB_CODE_LENGTH) return undefined;

  return code;
}

/**
 * Find an employer-assigned requisition id: a labeled field first, then a LinkedIn view URL,
 * then a `JR…` code.
 */
export function extractJobCode(text: string): string | undefined {
  for (const pattern of LABEL_PATTERNS) {
    const code = codeAfterLabel(text, pattern);
    if (code) return code;
  }

  const linkedinId = LINKEDIN_VIEW_PATH.exec(text)?.[1];
  if (linkedinId) {
    const code = `linkedin-${linkedinId}`;
    if (code.length <= MAX_JOB_CODE_LENGTH) return code;
  }

  const jrIdx = text.indexOf('JR');
  if (jrIdx !== -1) {
    const code = /^[A-Za-z0-9-]*/.exec(text.slice(jrIdx + 2))?.[0] ?? '';
    if (code.length >= JR_CODE_MIN_LENGTH && code.length <= JR_CODE_MAX_LENGTH) {
      return `JR${code}`;
    }
  }

  return undefined;
}
