export interface PostingHeader {
  title: string;
  employer?: string;
  location?: string;
}

const MIDDOT = '·';
const MAX_COMMA_EMPLOYER_LENGTH = 50;

/**
 * LinkedIn alert layout: `Title   Employer · Location`. The last run of two or more spaces
 * before the middot separates title from employer. Returns undefined when the text does not
 * have that shape.
 */
export function parseLinkedInLayout(text: string): PostingHeader | undefined {
  const trimmed = text.trim();
  const middotIdx = trimmed.indexOf(MIDDOT);
  if (middotIdx === -1) return undefined;

  const beforeMiddot = trimmed.slice(0, middotIdx).trim();
  const location = trimmed.slice(middotIdx + MIDDOT.length).trim();

  const gapPattern = /\s{2,}/g;
  let lastGap: RegExpExecArray | null = null;
  for (let match = gapPattern.exec(beforeMiddot); match; match = gapPattern.exec(beforeMiddot)) {
    lastGap = match;
  }
  if (!lastGap) return undefined;

  const title = beforeMiddot.slice(0, lastGap.index).trim();
  const employer = beforeMiddot.slice(lastGap.index + lastGap[0].length).trim();
  if (!title || !employer) return undefined;

  return location ? { title, employer, location } : { title, employer };
}

function splitAt(text: string, idx: number, separatorLength: number): { head: string; tail: string } {
  return {
    head: text.slice(0, idx).trim(),
    tail: text.slice(idx + separatorLength).trim(),
  };
}

/**
 * Split a one-line posting summary into title, employer and location.
 *
 * After the LinkedIn layout, tries `Title at Employer`, `Title - Employer` and
 * `Title, Employer`, each with guards against hyphenated titles and trailing locations.
 * When nothing fits, the whole text is the title.
 */
export function splitPosting(text: string): PostingHeader {
  const trimmed = text.trim();

  const linkedin = parseLinkedInLayout(trimmed);
  if (linkedin) return linkedin;

  const atMatch = / at /i.exec(trimmed);
  if (atMatch) {
    const { head, tail } = splitAt(trimmed, atMatch.index, atMatch[0].length);
    if (tail) return { title: head, employer: tail };
  }

  const dashIdx = trimmed.lastIndexOf(' - ');
  if (dashIdx !== -1) {
    const { head, tail } = splitAt(trimmed, dashIdx, 3);
    const lowered = tail.toLowerCase();
    if (tail && !lowered.includes('engineer') && !lowered.includes('developer')) {
      return { title: head, employer: tail };
    }
  }

  const commaIdx = trimmed.lastIndexOf(', ');
  if (commaIdx !== -1) {
    const { head, tail } = splitAt(trimmed, commaIdx, 2);
    if (tail && tail.length < MAX_COMMA_EMPLOYER_LENGTH && !tail.includes('Remote') && !tail.includes('Hybrid')) {
      return { title: head, employer: tail };
    }
  }

  return { title: trimmed };
}
