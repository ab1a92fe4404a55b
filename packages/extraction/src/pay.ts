import { HOURS_PER_YEAR, MAX_ANNUAL_PAY } from './rules.js';

export interface PayRange {
  min?: number;
  max?: number;
}

const DASH = String.raw`\s*(?:-|–|—|to)\s*`;
const GROUPED = String.raw`\$(\d{1,3}),(\d{3})(?:\.\d{2})?`;

const THOUSANDS_RANGE = new RegExp(String.raw`\$(\d{1,3})k(?:\/yr)?${DASH}\$(\d{1,3})k(?:\/yr)?`, 'i');
const LABELED_GROUPED_RANGE = new RegExp(String.raw`compensation[\s\S]{0,200}?${GROUPED}${DASH}${GROUPED}`, 'i');
const GROUPED_RANGE = new RegExp(`${GROUPED}${DASH}${GROUPED}`);
const HOURLY_RANGE = new RegExp(
  String.raw`\$(\d{1,3}(?:\.\d{1,2})?)\s*\/\s*(?:hr|hour)${DASH}\$(\d{1,3}(?:\.\d{1,2})?)\s*\/\s*(?:hr|hour)`,
  'i',
);

function ordered(min: number | undefined, max: number | undefined): PayRange {
  if (min !== undefined && max !== undefined && min > max) {
    return { min: max, max: min };
  }

  const range: PayRange = {};
  if (min !== undefined) range.min = min;
  if (max !== undefined) range.max = max;
  return range;
}

function grouped(head: string | undefined, tail: string | undefined): number {
  return Number(`${head ?? ''}${tail ?? ''}`);
}

/**
 * Walk every `$` and read the number after it. A trailing `k`, or a value under 1000, is taken
 * to be in thousands. Amounts above {@link MAX_ANNUAL_PAY} are skipped.
 */
function scanDollarAmounts(text: string): PayRange {
  const amounts: number[] = [];

  for (let i = 0; i < text.length && amounts.length < 2; i++) {
    if (text[i] !== '$') continue;

    let j = i + 1;
    while (j < text.length && /[\d,.]/.test(text[j] ?? '')) {
      j++;
    }

    const digits = text.slice(i + 1, j).replace(/,/g, '');
    if (!/\d/.test(digits)) continue;

    const value = Number.parseFloat(digits);
    if (!Number.isFinite(value)) continue;

    const inThousands = text[j] === 'k' || text[j] === 'K' || value < 1000;
    const amount = Math.round(inThousands ? value * 1000 : value);
    if (amount <= MAX_ANNUAL_PAY) {
      amounts.push(amount);
    }
    i = j - 1;
  }

  return ordered(amounts[0], amounts[1]);
}

/**
 * Extract an annual USD pay range. Patterns are tried from most to least specific; the
 * first that matches wins. Hourly ranges are annualized at 2080 hours.
 */
export function extractPayRange(text: string): PayRange {
  const thousands = THOUSANDS_RANGE.exec(text);
  if (thousands) {
    return ordered(Number(thousands[1]) * 1000, Number(thousands[2]) * 1000);
  }

  const labeled = LABELED_GROUPED_RANGE.exec(text) ?? GROUPED_RANGE.exec(text);
  if (labeled) {
    return ordered(grouped(labeled[1], labeled[2]), grouped(labeled[3], labeled[4]));
  }

  const hourly = HOURLY_RANGE.exec(text);
  if (hourly) {
    return ordered(
      Math.round(Number(hourly[1]) * HOURS_PER_YEAR),
      Math.round(Number(hourly[2]) * HOURS_PER_YEAR),
    );
  }

  return scanDollarAmounts(text);
}
