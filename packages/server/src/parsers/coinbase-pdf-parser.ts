import type { TransactionCandidate } from '../types/statements.js';
import { ParseError } from '../errors.js';
import type { StatementDocument } from './statement-document.js';
import type { ParseContext, StatementParser } from './types.js';
import {
  MONTH_NAME_DATE_FORMATS,
  cleanDescription,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from './validation.js';

// "Sep 4, 2025 BLUE BOTTLE COFFEE $6.50", also "Sept 14, 2025 ..."
const ROW_START = /^((?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)\s+\d{1,2},\s+\d{4})\s+(.*)$/;
const ROW_SHAPE = /^(.+?)\s+(-?\$?[\d,]+\.\d{2})$/;

type Section = 'payments' | 'purchases';

function sectionOf(line: string): Section | null {
  const lower = line.toLowerCase();
  if (lower.includes('payments and credits')) return 'payments';
  if ((lower.includes('transactions') || lower.includes('new charges')) && !lower.includes('total')) {
    return 'purchases';
  }
  return null;
}

/**
 * Coinbase Card monthly statement. Rows under "Payments and Credits" are
 * credits; everything else is spend.
 */
async function* parseCoinbasePdf(
  document: StatementDocument,
  { stats }: ParseContext
): AsyncGenerator<TransactionCandidate> {
  const lines = await document.lines();
  let section: Section = 'purchases';

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    const start = ROW_START.exec(line);
    if (!start) {
      section = sectionOf(line) ?? section;
      continue;
    }

    const rowNumber = i + 1;
    stats.rowsProcessed++;

    const shape = ROW_SHAPE.exec(start[2]);
    if (!shape) {
      throw new ParseError(`expected date, description and amount in "${line}"`, rowNumber);
    }

    const date = parseStatementDate(start[1].replace('Sept ', 'Sep ').replace(/\s+/g, ' '), MONTH_NAME_DATE_FORMATS);
    if (!date) {
      throw new ParseError(`invalid transaction date "${start[1]}"`, rowNumber);
    }

    const amount = parseAmount(shape[2]);
    if (amount === null) {
      throw new ParseError(`invalid amount "${shape[2]}"`, rowNumber);
    }

    const description = cleanDescription(shape[1]);
    if (!isValidDescription(description) || description.toLowerCase().startsWith('total')) {
      stats.rowsSkipped++;
      continue;
    }

    if (amount === 0) {
      stats.rowsSkipped++;
      continue;
    }

    yield {
      date,
      description,
      amount: section === 'payments' ? Math.abs(amount) : -Math.abs(amount),
      rawCategory: null,
    };
  }
}

export const coinbasePdfParser: StatementParser = {
  source: 'coinbase-pdf',
  kind: 'pdf',
  parse: parseCoinbasePdf,
};
