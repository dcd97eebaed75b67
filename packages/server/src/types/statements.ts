export const STATEMENT_SOURCES = [
  'chase-pdf',
  'chase-csv',
  'chase-report-pdf',
  'amex-csv',
  'amex-year-end-pdf',
  'coinbase-csv',
  'coinbase-pdf',
  'generic-ai',
] as const;

export type StatementSource = (typeof STATEMENT_SOURCES)[number];

export const TRANSACTION_CATEGORIES = [
  'Food & Dining',
  'Shopping',
  'Transportation',
  'Entertainment',
  'Bills & Utilities',
  'Travel',
  'Health',
  'Groceries',
  'Gas',
  'Subscriptions',
  'Income',
  'Transfer',
  'Other',
  'Uncategorized',
] as const;

export type TransactionCategory = (typeof TRANSACTION_CATEGORIES)[number];

// Assigned by the fast path when no rule matches
export const UNCATEGORIZED: TransactionCategory = 'Uncategorized';

export type EnrichmentStatus = 'fast' | 'enriched';

/**
 * A parsed row before hashing, dedup and id assignment.
 * Amounts are signed: negative is spend, positive is credit or income.
 */
export interface TransactionCandidate {
  date: string; // YYYY-MM-DD
  description: string;
  amount: number;
  rawCategory: string | null;
}

export function isTransactionCategory(value: string): value is TransactionCategory {
  return TRANSACTION_CATEGORIES.some((category) => category === value);
}
