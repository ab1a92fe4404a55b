import { HTMLElement, parse, TextNode } from 'node-html-parser';

/**
 * Only elements that are dropped anyway keep their content as raw text; `<pre>` is parsed
 * as markup like any other element.
 */
const RAW_TEXT_ELEMENTS = { script: true, noscript: true, style: true };

export function parseHtml(html: string): HTMLElement {
  return parse(html, { comment: false, blockTextElements: RAW_TEXT_ELEMENTS });
}

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Split into lines, trim each, drop the empty ones.
 */
export function normalizeLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export function looksLikeHtml(input: string): boolean {
  return /<\/?[a-z][^>]*>/i.test(input);
}

/**
 * Text of the element's own text-node children, descendants excluded.
 */
export function directText(element: HTMLElement): string {
  return element.childNodes
    .filter((child): child is TextNode => child instanceof TextNode)
    .map((child) => child.text)
    .join('');
}

/**
 * Every descendant text node joined with a single space. Runs of whitespace inside a node are
 * kept as-is: alert emails separate title and employer with them.
 */
export function collectText(element: HTMLElement): string {
  const parts: string[] = [];

  const visit = (node: HTMLElement): void => {
    for (const child of node.childNodes) {
      if (child instanceof TextNode) {
        parts.push(child.text);
      } else if (child instanceof HTMLElement) {
        visit(child);
      }
    }
  };

  visit(element);
  return parts.join(' ').trim();
}

export function tagNameOf(element: HTMLElement): string {
  return (element.rawTagName ?? '').toLowerCase();
}
