import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { StatementSource } from '../../types/statements.js';

export const uploadedFiles = sqliteTable('uploaded_files', {
  id: text('id').primaryKey(),
  filename: text('filename').notNull(),
  fileHash: text('file_hash').notNull().unique(), // sha256 of the raw bytes
  source: text('source').$type<StatementSource>().notNull(),
  transactionCount: integer('transaction_count').notNull().default(0),
  uploadedAt: text('uploaded_at').notNull(),
});

export type UploadedFile = typeof uploadedFiles.$inferSelect;
export type NewUploadedFile = typeof uploadedFiles.$inferInsert;
