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

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

// "01/15 STARBUCKS STORE 123 SEATTLE WA 5.75"
const ROW_START = /^(\d{2})\/(\d{2})\s+(.*)$/;
const ROW_SHAPE = /^(.+?)\s+(-?\$?[\d,]+\.\d{2})$/;

// Section headings Chase prints as if they were rows
const HEADING_DESCRIPTIONS = new Set([
  'PAYMENTS AND OTHER CREDITS',
  'PURCHASE',
  'PURCHASES',
  'FEES CHARGED',
  'INTEREST CHARGED',
  'CASH ADVANCES',
  'BALANCE TRANSFERS',
]);

// Summary, footer and column-header text that can follow a row which lost its amount
const NON_ROW_TEXT = new RegExp(
  '\\b(?:' + [
    'total', 'balance', 'fees?', 'interest', 'purchases?', 'payments?', 'page', 'continued',
    'account summary', 'account activity', 'credit limit', 'available credit',
    'transactions?', 'date', 'description', 'amount',
  ].join('|') + ')\\b',
  'i'
);

function isContinuationLine(line: string): boolean {
  return !ROW_START.test(line)
    && !NON_ROW_TEXT.test(line)
    && !HEADING_DESCRIPTIONS.has(line.toUpperCase());
}

type YearResolver = (month: number) => number;

function fullYear(year: string): number {
  const value = parseInt(year, 10);
  return year.length === 2 ? 2000 + value : value;
}

/**
 * Chase prints rows as MM/DD only. The year comes from the statement period;
 * a period spanning New Year puts the later months in the opening year.
 */
export function resolveStatementYear(text: string): YearResolver | null {
  const period = text.match(
    /Opening\/Closing Date\s*(\d{2})\/(\d{2})\/(\d{2,4})\s*-\s*(\d{2})\/(\d{2})\/(\d{2,4})/i
  );
  if (period) {
    const openingYear = fullYear(period[3]);
    const closingMonth = parseInt(period[4], 10);
    const closingYear = fullYear(period[6]);
    return (month) => (month > closingMonth ? openingYear : closingYear);
  }

  const statementDate = text.match(/Statement Date:?\s*(\d{2})\/(\d{2})\/(\d{2,4})/i);
  if (statementDate) {
    const statementMonth = parseInt(statementDate[1], 10);
    const year = fullYear(statementDate[3]);
    return (month) => (month > statementMonth ? year - 1 : year);
  }

  const monthHeading = text.match(new RegExp(`\\b(${MONTHS.join('|')})\\s+(20\\d{2})\\b`, 'i'));
  if (monthHeading) {
    const year = parseInt(monthHeading[2], 10);
    return () => year;
  }

  return null;
}

/**
 * Chase credit card statement. Purchases print positive and credits negative,
 * so amounts are negated into the ledger convention.
 */
async function* parseChasePdf(
  document: StatementDocument,
  { stats }: ParseContext
): AsyncGenerator<TransactionCandidate> {
  const text = await document.text();
  const lines = await document.lines();
  const yearFor = resolveStatementYear(text);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const start = ROW_START.exec(line);
    if (!start) continue;

    const rowNumber = i + 1;
    stats.rowsProcessed++;

    let shape = ROW_SHAPE.exec(start[3]);
    if (!shape) {
      // Long merchant names wrap; the amount then ends the next line
      const next = lines[i + 1];
      if (next !== undefined && isContinuationLine(next)) {
        shape = ROW_SHAPE.exec(`${start[3]} ${next}`);
        if (shape) i++;
      }
    }
    if (!shape) {
      throw new ParseError(`expected date, description and amount in "${line}"`, rowNumber);
    }

    const description = cleanDescription(shape[1]);
    if (HEADING_DESCRIPTIONS.has(description.toUpperCase())) {
      stats.rowsSkipped++;
      continue;
    }

    if (!yearFor) {
      throw new ParseError('Could not determine the statement year for this Chase statement');
    }

    const month = parseInt(start[1], 10);
    const date = parseStatementDate(`${start[1]}/${start[2]}/${yearFor(month)}`, ['MM/DD/YYYY']);
    if (!date) {
      throw new ParseError(`invalid transaction date "${start[1]}/${start[2]}"`, rowNumber);
    }

    const amount = parseAmount(shape[2]);
    if (amount === null) {
      throw new ParseError(`invalid amount "${shape[2]}"`, rowNumber);
    }

    if (!isValidDescription(description)) {
      stats.rowsSkipped++;
      stats.warnings.push(`Row ${rowNumber}: oversized description`);
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

    yield { date, description, amount: -amount, rawCategory: null };
  }
}

export const chasePdfParser: StatementParser = {
  source: 'chase-pdf',
  kind: 'pdf',
  parse: parseChasePdf,
};
