import { and, asc, between, desc, eq, gte, lte, sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import {
  transactions,
  uploadedFiles,
  type AppDatabase,
  type NewTransaction,
  type NewUploadedFile,
  type Transaction,
  type UploadedFile,
} from '../db/index.js';
import type { StatementSource, TransactionCategory } from '../types/statements.js';

export interface TransactionRecord extends Omit<Transaction, 'tags'> {
  tags: string[];
}

export type InsertFileResult =
  | { status: 'inserted'; inserted: number; ignored: number }
  | { status: 'duplicate' };

export interface TransactionFilters {
  startDate?: string;
  endDate?: string;
  category?: TransactionCategory;
  source?: StatementSource;
  limit?: number;
}

/** What the ingestion orchestrator needs from storage. */
export interface IngestionStore {
  insertFile(file: Omit<NewUploadedFile, 'transactionCount'>, rows: NewTransaction[]): InsertFileResult;
  existingHashes(source: StatementSource): Set<string>;
  existingFileHash(fileHash: string): boolean;
}

/** What the background enrichment worker needs from storage. */
export interface EnrichmentStore {
  unenrichedTransactions(fileHash: string): TransactionRecord[];
  updateTransactionEnrichment(id: string, category: TransactionCategory, tags: string[]): boolean;
}

const tagsSchema = z.array(z.string());

function parseTags(value: string): string[] {
  try {
    const parsed = tagsSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : [];
  } catch (err) {
    console.warn('[Store] Ignoring unreadable tags column:', err instanceof Error ? err.message : err);
    return [];
  }
}

function toRecord(row: Transaction): TransactionRecord {
  return { ...row, tags: parseTags(row.tags) };
}

// Keeps each INSERT well under SQLite's bound-parameter limit
const INSERT_CHUNK_SIZE = 500;

export class TransactionStore implements IngestionStore, EnrichmentStore {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Writes the file record and its transactions in one SQLite transaction.
   * Rows whose hash is already stored are ignored and counted; a file hash
   * that is already stored writes nothing.
   */
  insertFile(file: Omit<NewUploadedFile, 'transactionCount'>, rows: NewTransaction[]): InsertFileResult {
    return this.db.transaction((tx): InsertFileResult => {
      const existing = tx
        .select({ id: uploadedFiles.id })
        .from(uploadedFiles)
        .where(eq(uploadedFiles.fileHash, file.fileHash))
        .get();
      if (existing) {
        return { status: 'duplicate' };
      }

      let inserted = 0;
      for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
        const chunk = rows.slice(i, i + INSERT_CHUNK_SIZE);
        const result = tx
          .insert(transactions)
          .values(chunk)
          .onConflictDoNothing({ target: transactions.transactionHash })
          .run();
        inserted += result.changes;
      }

      tx.insert(uploadedFiles).values({ ...file, transactionCount: inserted }).run();

      return { status: 'inserted', inserted, ignored: rows.length - inserted };
    });
  }

  existingHashes(source: StatementSource): Set<string> {
    const rows = this.db
      .select({ hash: transactions.transactionHash })
      .from(transactions)
      .where(eq(transactions.source, source))
      .all();
    return new Set(rows.map((row) => row.hash));
  }

  existingFileHash(fileHash: string): boolean {
    return this.findFile(fileHash) !== null;
  }

  findFile(fileHash: string): UploadedFile | null {
    return this.db
      .select()
      .from(uploadedFiles)
      .where(eq(uploadedFiles.fileHash, fileHash))
      .get() ?? null;
  }

  listFiles(): UploadedFile[] {
    return this.db.select().from(uploadedFiles).orderBy(desc(uploadedFiles.uploadedAt)).all();
  }

  // Rows still carrying their fast-path category, in the order they were uploaded
  unenrichedTransactions(fileHash: string): TransactionRecord[] {
    return this.db
      .select()
      .from(transactions)
      .where(and(
        eq(transactions.sourceFileHash, fileHash),
        eq(transactions.enrichmentStatus, 'fast')
      ))
      .orderBy(asc(transactions.position))
      .all()
      .map(toRecord);
  }

  updateTransactionEnrichment(id: string, category: TransactionCategory, tags: string[]): boolean {
    const result = this.db
      .update(transactions)
      .set({
        category,
        tags: JSON.stringify(tags),
        enrichmentStatus: 'enriched',
        updatedAt: new Date().toISOString(),
      })
      .where(eq(transactions.id, id))
      .run();
    return result.changes === 1;
  }

  // Fast-path maintenance: leaves the enrichment status alone
  updateFastPath(id: string, changes: { category?: TransactionCategory; tags?: string[] }): boolean {
    const result = this.db
      .update(transactions)
      .set({
        ...(changes.category ? { category: changes.category } : {}),
        ...(changes.tags ? { tags: JSON.stringify(changes.tags) } : {}),
        updatedAt: new Date().toISOString(),
      })
      .where(eq(transactions.id, id))
      .run();
    return result.changes === 1;
  }

  fastPathTransactions(): TransactionRecord[] {
    return this.db
      .select()
      .from(transactions)
      .where(eq(transactions.enrichmentStatus, 'fast'))
      .orderBy(asc(transactions.createdAt), asc(transactions.position))
      .all()
      .map(toRecord);
  }

  untaggedTransactions(): TransactionRecord[] {
    return this.db
      .select()
      .from(transactions)
      .where(eq(transactions.tags, '[]'))
      .orderBy(asc(transactions.createdAt), asc(transactions.position))
      .all()
      .map(toRecord);
  }

  listTransactions(filters: TransactionFilters = {}): TransactionRecord[] {
    const conditions: SQL[] = [];

    if (filters.startDate && filters.endDate) {
      conditions.push(between(transactions.date, filters.startDate, filters.endDate));
    } else if (filters.startDate) {
      conditions.push(gte(transactions.date, filters.startDate));
    } else if (filters.endDate) {
      conditions.push(lte(transactions.date, filters.endDate));
    }
    if (filters.category) {
      conditions.push(eq(transactions.category, filters.category));
    }
    if (filters.source) {
      conditions.push(eq(transactions.source, filters.source));
    }

    return this.db
      .select()
      .from(transactions)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(transactions.date), asc(transactions.position))
      .limit(filters.limit ?? 100)
      .all()
      .map(toRecord);
  }

  countTransactions(): number {
    const row = this.db
      .select({ count: sql<number>`count(*)` })
      .from(transactions)
      .get();
    return row?.count ?? 0;
  }
}
