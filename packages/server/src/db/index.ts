import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';

import * as transactionsSchema from './schema/transactions.js';
import * as uploadsSchema from './schema/uploads.js';

const schema = {
  ...transactionsSchema,
  ...uploadsSchema,
};

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: DatabaseType;
  db: AppDatabase;
}

/**
 * Opens (and creates, if needed) the SQLite database at `dbPath`.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  const inMemory = dbPath === ':memory:';

  if (!inMemory) {
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite: DatabaseType = new Database(dbPath);
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }

  initializeDatabase(sqlite);

  return { sqlite, db: drizzle(sqlite, { schema }) };
}

// Initialize tables
export function initializeDatabase(sqlite: DatabaseType) {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS uploaded_files (
      id TEXT PRIMARY KEY,
      filename TEXT NOT NULL,
      file_hash TEXT NOT NULL UNIQUE,
      source TEXT NOT NULL,
      transaction_count INTEGER NOT NULL DEFAULT 0,
      uploaded_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      source_file_hash TEXT NOT NULL,
      transaction_hash TEXT NOT NULL UNIQUE,
      date TEXT NOT NULL,
      description TEXT NOT NULL,
      amount REAL NOT NULL,
      category TEXT NOT NULL,
      raw_category TEXT,
      tags TEXT NOT NULL DEFAULT '[]',
      enrichment_status TEXT NOT NULL DEFAULT 'fast',
      position INTEGER NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_transactions_file ON transactions(source_file_hash, position);
    CREATE INDEX IF NOT EXISTS idx_transactions_source ON transactions(source);
    CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date);
  `);
}

export * from './schema/transactions.js';
export * from './schema/uploads.js';
