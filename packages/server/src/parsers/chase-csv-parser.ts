import type { TransactionCandidate } from '../types/statements.js';
import { ParseError } from '../errors.js';
import { cellAt, findHeaderRow, isBlankRow } from './csv-reader.js';
import type { StatementDocument } from './statement-document.js';
import type { ParseContext, StatementParser } from './types.js';
import {
  US_DATE_FORMATS,
  cleanDescription,
  isLikelyPayment,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from './validation.js';

const CHASE_COLUMNS = {
  date: ['transaction date'],
  postDate: ['post date'],
  description: ['description'],
  category: ['category'],
  type: ['type'],
  amount: ['amount'],
};

/**
 * Chase credit card activity export:
 * Transaction Date,Post Date,Description,Category,Type,Amount,Memo
 * Amounts are already signed (purchases negative, returns positive).
 */
async function* parseChaseCsv(
  document: StatementDocument,
  { stats }: ParseContext
): AsyncGenerator<TransactionCandidate> {
  const rows = await document.rows();
  const header = findHeaderRow<keyof typeof CHASE_COLUMNS>(rows, CHASE_COLUMNS, ['date', 'description', 'amount']);
  if (!header) {
    throw new ParseError('Chase CSV header row (Transaction Date, Description, Amount) not found');
  }

  for (let i = header.index + 1; i < rows.length; i++) {
    const row = rows[i];
    if (isBlankRow(row)) continue;

    const rowNumber = i + 1;
    stats.rowsProcessed++;

    const dateStr = cellAt(row, header.column('date'));
    if (!dateStr) {
      stats.rowsSkipped++;
      continue;
    }

    const date = parseStatementDate(dateStr, US_DATE_FORMATS);
    if (!date) {
      throw new ParseError(`unrecognized transaction date "${dateStr}"`, rowNumber);
    }

    const amountStr = cellAt(row, header.column('amount'));
    const amount = parseAmount(amountStr);
    if (amount === null) {
      throw new ParseError(`missing or invalid amount "${amountStr}"`, rowNumber);
    }

    const description = cleanDescription(cellAt(row, header.column('description')));
    if (!isValidDescription(description)) {
      stats.rowsSkipped++;
      stats.warnings.push(`Row ${rowNumber}: empty or oversized description`);
      continue;
    }

    const rawCategory = cellAt(row, header.column('category')) || null;
    const type = cellAt(row, header.column('type')).toLowerCase();

    // Card payments are transfers from the bank account, not spending or income
    if (type === 'payment' || isLikelyPayment(description, rawCategory)) {
      stats.paymentsFiltered++;
      continue;
    }

    if (amount === 0) {
      stats.rowsSkipped++;
      continue;
    }

    yield { date, description, amount, rawCategory };
  }
}

export const chaseCsvParser: StatementParser = {
  source: 'chase-csv',
  kind: 'csv',
  parse: parseChaseCsv,
};
