import type { TransactionCandidate } from '../types/statements.js';
import { ParseError } from '../errors.js';
import { cellAt, findHeaderRow, isBlankRow } from './csv-reader.js';
import type { StatementDocument } from './statement-document.js';
import type { ParseContext, StatementParser } from './types.js';
import {
  cleanDescription,
  isLikelyPayment,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from './validation.js';

const AMEX_DATE_FORMATS = ['MM/DD/YYYY', 'M/D/YYYY', 'MM/DD/YY', 'M/D/YY', 'YYYY-MM-DD', 'MM-DD-YYYY'];

const AMEX_COLUMNS = {
  date: ['date', 'transaction date'],
  description: ['description', 'merchant'],
  amount: ['amount'],
  category: ['category'],
};

// Amex exports charges as positive numbers and credits as negative
async function* parseAmexCsv(
  document: StatementDocument,
  { stats }: ParseContext
): AsyncGenerator<TransactionCandidate> {
  const rows = await document.rows();
  const header = findHeaderRow<keyof typeof AMEX_COLUMNS>(rows, AMEX_COLUMNS, ['date', 'description', 'amount']);
  if (!header) {
    throw new ParseError('Amex CSV header row (Date, Description, Amount) not found');
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

    const date = parseStatementDate(dateStr, AMEX_DATE_FORMATS);
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
    if (isLikelyPayment(description, rawCategory)) {
      stats.paymentsFiltered++;
      continue;
    }

    if (amount === 0) {
      stats.rowsSkipped++;
      continue;
    }

    yield { date, description, amount: -amount, rawCategory };
  }
}

export const amexCsvParser: StatementParser = {
  source: 'amex-csv',
  kind: 'csv',
  parse: parseAmexCsv,
};
