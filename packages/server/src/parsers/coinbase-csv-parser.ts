import type { TransactionCandidate } from '../types/statements.js';
import { ParseError } from '../errors.js';
import { cellAt, findHeaderRow, isBlankRow } from './csv-reader.js';
import type { StatementDocument } from './statement-document.js';
import type { ParseContext, StatementParser } from './types.js';
import {
  US_DATE_FORMATS,
  cleanDescription,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from './validation.js';

const COINBASE_DATE_FORMATS = [
  'YYYY-MM-DDTHH:mm:ss[Z]',
  'YYYY-MM-DDTHH:mm:ss.SSS[Z]',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD HH:mm:ss [UTC]',
  'YYYY-MM-DD',
  ...US_DATE_FORMATS,
];

const COINBASE_COLUMNS = {
  date: ['timestamp', 'date', 'transaction date'],
  description: ['description', 'merchant', 'notes'],
  amount: ['usd', 'amount (usd)', 'amount'],
  type: ['transaction type', 'type'],
  asset: ['asset'],
};

const FALLBACK_DESCRIPTION = 'Coinbase Card Transaction';

/**
 * Coinbase Card export. The file carries unsigned USD amounts; crypto rewards
 * are credits and everything else is spend.
 */
async function* parseCoinbaseCsv(
  document: StatementDocument,
  { stats }: ParseContext
): AsyncGenerator<TransactionCandidate> {
  const rows = await document.rows();
  const header = findHeaderRow<keyof typeof COINBASE_COLUMNS>(rows, COINBASE_COLUMNS, ['date', 'amount']);
  if (!header) {
    throw new ParseError('Coinbase CSV header row (Timestamp, USD) not found');
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

    const date = parseStatementDate(dateStr, COINBASE_DATE_FORMATS);
    if (!date) {
      throw new ParseError(`unrecognized timestamp "${dateStr}"`, rowNumber);
    }

    const amountStr = cellAt(row, header.column('amount'));
    const amount = parseAmount(amountStr);
    if (amount === null) {
      throw new ParseError(`missing or invalid USD amount "${amountStr}"`, rowNumber);
    }
    if (amount === 0) {
      stats.rowsSkipped++;
      continue;
    }

    const type = cellAt(row, header.column('type'));
    const description = cleanDescription(cellAt(row, header.column('description'))) || type || FALLBACK_DESCRIPTION;
    if (!isValidDescription(description)) {
      stats.rowsSkipped++;
      stats.warnings.push(`Row ${rowNumber}: oversized description`);
      continue;
    }

    const isReward = type.toLowerCase().includes('reward');

    yield {
      date,
      description,
      amount: isReward ? Math.abs(amount) : -Math.abs(amount),
      rawCategory: type || null,
    };
  }
}

export const coinbaseCsvParser: StatementParser = {
  source: 'coinbase-csv',
  kind: 'csv',
  parse: parseCoinbaseCsv,
};
