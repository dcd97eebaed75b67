import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

dayjs.extend(customParseFormat);

export const MAX_ABS_AMOUNT = 1_000_000;
export const MIN_YEAR = 2000;
export const MAX_YEAR = 2100;
export const MAX_DESCRIPTION_LENGTH = 500;

export const US_DATE_FORMATS = ['MM/DD/YYYY', 'M/D/YYYY', 'MM/DD/YY', 'M/D/YY'];
export const MONTH_NAME_DATE_FORMATS = ['MMM D, YYYY', 'MMMM D, YYYY'];

const PAYMENT_KEYWORDS = [
  'payment - thank you',
  'payment thank you',
  'autopay payment',
  'automatic payment',
  'online payment',
  'ach payment',
  'mobile payment',
  'payment received',
  'bill pay',
  'epay',
  'check payment',
];

/**
 * Parse an amount as printed on a statement: "$1,234.56", "(12.00)", "45.00-".
 * Returns null when the text is not a usable amount.
 */
export function parseAmount(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return isValidAmount(value) ? value : null;
  }

  let cleaned = value.replace(/[$\s]/g, '').replace(/,/g, '');
  if (!cleaned) return null;

  if (cleaned.startsWith('(') && cleaned.endsWith(')')) {
    cleaned = '-' + cleaned.slice(1, -1);
  } else if (cleaned.endsWith('-') && !cleaned.startsWith('-')) {
    cleaned = '-' + cleaned.slice(0, -1);
  }

  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;

  const amount = parseFloat(cleaned);
  return isValidAmount(amount) ? amount : null;
}

export function isValidAmount(amount: number): boolean {
  return Number.isFinite(amount) && Math.abs(amount) <= MAX_ABS_AMOUNT;
}

/**
 * Strict date parsing: the first format that matches exactly wins.
 * Returns YYYY-MM-DD, or null when nothing matches or the year is implausible.
 */
export function parseStatementDate(value: string, formats: string[]): string | null {
  const str = value.trim();
  if (!str) return null;

  for (const fmt of formats) {
    const parsed = dayjs(str, fmt, true);
    if (parsed.isValid()) {
      const year = parsed.year();
      if (year < MIN_YEAR || year > MAX_YEAR) return null;
      return parsed.format('YYYY-MM-DD');
    }
  }

  return null;
}

export function cleanDescription(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function isValidDescription(value: string): boolean {
  return value.length >= 1 && value.length <= MAX_DESCRIPTION_LENGTH;
}

export function isLikelyPayment(description: string, rawCategory?: string | null): boolean {
  const desc = description.toLowerCase();
  if (PAYMENT_KEYWORDS.some((keyword) => desc.includes(keyword))) {
    return true;
  }
  return !!rawCategory && rawCategory.toLowerCase().includes('payment');
}
