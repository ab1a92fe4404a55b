import { HTMLElement, TextNode } from 'node-html-parser';
import {
  BLOCK_TAGS,
  END_OF_CONTENT_MARKERS,
  NOISE_SCAN_MAX_LENGTH,
  SCRIPT_SIGNATURES,
  SCRIPT_TEXT_MIN_LENGTH,
  SKIPPED_TAGS,
  UI_NOISE_PHRASES,
} from './rules.js';
import { directText, normalizeLines, normalizeWhitespace, parseHtml, tagNameOf } from './text.js';

function isInlinedScript(element: HTMLElement): boolean {
  const own = directText(element).trim();
  return own.length > SCRIPT_TEXT_MIN_LENGTH && SCRIPT_SIGNATURES.some((signature) => own.includes(signature));
}

function isUiNoise(element: HTMLElement): boolean {
  const full = element.text.toLowerCase();
  return full.length < NOISE_SCAN_MAX_LENGTH && UI_NOISE_PHRASES.some((phrase) => full.includes(phrase));
}

function renderChildren(element: HTMLElement, out: string[]): void {
  for (const child of element.childNodes) {
    if (child instanceof TextNode) {
      const text = normalizeWhitespace(child.text);
      if (text) {
        out.push(`${text} `);
      }
    } else if (child instanceof HTMLElement) {
      renderElement(child, out);
    }
  }
}

function renderElement(element: HTMLElement, out: string[]): void {
  const tag = tagNameOf(element);

  if (SKIPPED_TAGS.has(tag) || isInlinedScript(element) || isUiNoise(element)) {
    return;
  }

  if (tag === 'br') {
    out.push('\n');
    return;
  }

  if (tag === 'li') {
    out.push('• ');
    renderChildren(element, out);
    out.push('\n');
    return;
  }

  renderChildren(element, out);
  if (BLOCK_TAGS.has(tag)) {
    out.push('\n');
  }
}

/**
 * Cut the text at the first end-of-content marker, testing markers in table order.
 */
export function truncateAtEndMarker(text: string): string {
  for (const marker of END_OF_CONTENT_MARKERS) {
    const idx = text.indexOf(marker);
    if (idx !== -1) {
      return text.slice(0, idx).trimEnd();
    }
  }

  return text;
}

/**
 * Render an HTML fragment (page element or email body) as plain text: list items become
 * `• ` bullets, blocks become lines, page chrome and inlined scripts are dropped, and
 * everything after the end of the job content is cut. Returns '' when nothing remains.
 */
export function cleanHtml(html: string): string {
  const root = parseHtml(html);
  const out: string[] = [];

  renderChildren(root, out);

  return truncateAtEndMarker(normalizeLines(out.join('')));
}
