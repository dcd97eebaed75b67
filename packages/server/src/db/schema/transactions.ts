import { sqliteTable, text, real, integer } from 'drizzle-orm/sqlite-core';
import type { EnrichmentStatus, StatementSource, TransactionCategory } from '../../types/statements.js';

export const transactions = sqliteTable('transactions', {
  id: text('id').primaryKey(),
  source: text('source').$type<StatementSource>().notNull(),
  sourceFileHash: text('source_file_hash').notNull(),
  transactionHash: text('transaction_hash').notNull().unique(),
  date: text('date').notNull(), // YYYY-MM-DD
  description: text('description').notNull(),
  amount: real('amount').notNull(), // negative = spend
  category: text('category').$type<TransactionCategory>().notNull(),
  rawCategory: text('raw_category'),
  tags: text('tags').notNull().default('[]'), // JSON array of strings
  enrichmentStatus: text('enrichment_status').$type<EnrichmentStatus>().notNull().default('fast'),
  position: integer('position').notNull(), // row order within the upload
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export type Transaction = typeof transactions.$inferSelect;
export type NewTransaction = typeof transactions.$inferInsert;
