import type { TransactionCandidate } from '../types/statements.js';
import { ParseError } from '../errors.js';
import type { StatementDocument } from './statement-document.js';
import type { ParseContext, StatementParser } from './types.js';
import {
  MONTH_NAME_DATE_FORMATS,
  cleanDescription,
  isLikelyPayment,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from './validation.js';

// Spending report groups rows under these headings
const REPORT_CATEGORIES = new Map<string, string>(Object.entries({
  AUTOMOTIVE: 'Gas',
  BILLS_AND_UTILITIES: 'Bills & Utilities',
  EDUCATION: 'Other',
  ENTERTAINMENT: 'Entertainment',
  FEES_AND_ADJUSTMENTS: 'Other',
  FOOD_AND_DRINK: 'Food & Dining',
  GAS: 'Gas',
  GIFTS_AND_DONATIONS: 'Shopping',
  GROCERIES: 'Groceries',
  HEALTH_AND_WELLNESS: 'Health',
  HOME: 'Shopping',
  PERSONAL: 'Other',
  PROFESSIONAL_SERVICES: 'Other',
  SHOPPING: 'Shopping',
  TRAVEL: 'Travel',
}));

const DATE = String.raw`[A-Z][a-z]{2,8}\.?\s+\d{1,2},\s+\d{4}`;
// "Jan 26, 2025 Jan 29, 2025 UNCLE IKES CAR WASH $20.25"
const ROW_START = new RegExp(`^(${DATE})\\s+(.*)$`);
const ROW_SHAPE = new RegExp(`^(${DATE})\\s+(.+?)\\s+(-?\\$?[\\d,]+\\.\\d{2})$`);

function parseReportDate(value: string): string | null {
  return parseStatementDate(value.replace(/\s+/g, ' ').replace('.', '').replace('Sept ', 'Sep '), MONTH_NAME_DATE_FORMATS);
}

/**
 * Chase "Spending Report" export: transaction date, posted date, description
 * and amount per row, spend printed positive.
 */
async function* parseChaseReportPdf(
  document: StatementDocument,
  { stats }: ParseContext
): AsyncGenerator<TransactionCandidate> {
  const lines = await document.lines();
  let currentCategory: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    const heading = REPORT_CATEGORIES.get(line.toUpperCase());
    if (heading) {
      currentCategory = heading;
      continue;
    }

    const start = ROW_START.exec(line);
    if (!start) continue;

    const rowNumber = i + 1;
    stats.rowsProcessed++;

    const shape = ROW_SHAPE.exec(start[2]);
    if (!shape) {
      throw new ParseError(
        `expected transaction date, posted date, description and amount in "${line}"`,
        rowNumber
      );
    }

    const date = parseReportDate(start[1]);
    if (!date || !parseReportDate(shape[1])) {
      throw new ParseError(`invalid date in "${line}"`, rowNumber);
    }

    const amount = parseAmount(shape[3]);
    if (amount === null) {
      throw new ParseError(`invalid amount "${shape[3]}"`, rowNumber);
    }

    const description = cleanDescription(shape[2]);
    if (!isValidDescription(description) || description.toLowerCase() === 'total') {
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

    yield { date, description, amount: -amount, rawCategory: currentCategory };
  }
}

export const chaseReportPdfParser: StatementParser = {
  source: 'chase-report-pdf',
  kind: 'pdf',
  parse: parseChaseReportPdf,
};
