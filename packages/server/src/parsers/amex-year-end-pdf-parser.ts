import type { TransactionCandidate } from '../types/statements.js';
import { ParseError } from '../errors.js';
import type { StatementDocument } from './statement-document.js';
import type { ParseContext, StatementParser } from './types.js';
import {
  cleanDescription,
  isLikelyPayment,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from './validation.js';

const AMEX_CATEGORIES = [
  'Merchandise & Supplies',
  'Fees & Adjustments',
  'Travel Agencies',
  'Taxis & Coach',
  'Rail Services',
  'Internet Purchase',
  'Transportation',
  'Entertainment',
  'Miscellaneous',
  'Restaurant',
  'Airline',
  'Travel',
  'Other',
];

const MONTH_NAMES = new Set([
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
  'jan', 'feb', 'mar', 'apr', 'jun', 'jul', 'aug', 'sep', 'sept', 'oct', 'nov', 'dec',
]);

const STATE_CODES = [
  'AL', 'AK', 'AZ', 'AR', 'CA', 'CO', 'CT', 'DE', 'DC', 'FL', 'GA', 'HI', 'ID', 'IL', 'IN', 'IA',
  'KS', 'KY', 'LA', 'ME', 'MD', 'MA', 'MI', 'MN', 'MS', 'MO', 'MT', 'NE', 'NV', 'NH', 'NJ', 'NM',
  'NY', 'NC', 'ND', 'OH', 'OK', 'OR', 'PA', 'RI', 'SC', 'SD', 'TN', 'TX', 'UT', 'VT', 'VA', 'WA',
  'WV', 'WI', 'WY',
];

const LABELS = [
  'card member',
  'account number',
  'subtotal',
  'total',
  'month billed',
  'year-end',
  'american express',
  'prepared for',
  'includes charges',
];

// "01/25/2025 February DELTA AIR LINES ATLANTA $401.97"
const ROW_START = /^(\d{1,2}\/\d{1,2}\/\d{4})\s+(.*)$/;
const ROW_SHAPE = /^([A-Za-z]+)\s+(.+?)\s+(-?\$?[\d,]+\.\d{2})$/;
const TRAILING_NUMBER = /\s+\d{2,}$/;
const TRAILING_STATE = new RegExp(`\\s+(?:${STATE_CODES.join('|')})$`);

function categoryHeading(line: string): string | null {
  if (/\d/.test(line)) return null;
  const lower = line.toLowerCase();
  for (const category of AMEX_CATEGORIES) {
    const name = category.toLowerCase();
    // "Restaurant" or "Restaurant - Bar & Cafe"
    if (lower === name || lower.startsWith(`${name} -`) || lower.startsWith(`${name}-`)) {
      return category;
    }
  }
  return null;
}

export function cleanAmexDescription(value: string): string {
  return cleanDescription(value).replace(TRAILING_NUMBER, '').replace(TRAILING_STATE, '').trim();
}

/**
 * Amex Year-End Summary: one line per charge with the billing month, grouped
 * under spending category headings. Every row is a charge.
 */
async function* parseAmexYearEndPdf(
  document: StatementDocument,
  { stats }: ParseContext
): AsyncGenerator<TransactionCandidate> {
  const lines = await document.lines();
  let currentCategory: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    const start = ROW_START.exec(line);
    if (!start) {
      currentCategory = categoryHeading(line) ?? currentCategory;
      continue;
    }

    const rowNumber = i + 1;
    stats.rowsProcessed++;

    const shape = ROW_SHAPE.exec(start[2]);
    if (!shape || !MONTH_NAMES.has(shape[1].toLowerCase())) {
      throw new ParseError(`expected date, month billed, description and amount in "${line}"`, rowNumber);
    }

    const date = parseStatementDate(start[1], ['MM/DD/YYYY', 'M/D/YYYY']);
    if (!date) {
      throw new ParseError(`invalid transaction date "${start[1]}"`, rowNumber);
    }

    const amount = parseAmount(shape[3]);
    if (amount === null) {
      throw new ParseError(`invalid amount "${shape[3]}"`, rowNumber);
    }

    const description = cleanAmexDescription(shape[2]);
    const lower = description.toLowerCase();
    if (description.length < 3 || !isValidDescription(description) || LABELS.some((label) => lower.includes(label))) {
      stats.rowsSkipped++;
      continue;
    }

    if (isLikelyPayment(description)) {
      stats.paymentsFiltered++;
      continue;
    }

    if (amount === 0) {
      stats.rowsSkipped++;
      continue;
    }

    yield { date, description, amount: -Math.abs(amount), rawCategory: currentCategory };
  }
}

export const amexYearEndPdfParser: StatementParser = {
  source: 'amex-year-end-pdf',
  kind: 'pdf',
  parse: parseAmexYearEndPdf,
};
