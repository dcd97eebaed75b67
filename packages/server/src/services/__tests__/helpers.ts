import { openDatabase, type NewTransaction } from '../../db/index.js';
import { TransactionStore } from '../transaction-store.js';

export function createTestStore(): TransactionStore {
  const { db } = openDatabase(':memory:');
  return new TransactionStore(db);
}

export function makeRow(fileHash: string, position: number, overrides: Partial<NewTransaction> = {}): NewTransaction {
  const now = '2024-05-01T00:00:00.000Z';
  return {
    id: `${fileHash}-${position}`,
    source: 'chase-csv',
    sourceFileHash: fileHash,
    transactionHash: `${fileHash}-hash-${position}`,
    date: '2024-04-01',
    description: `MERCHANT ${position}`,
    amount: -(position + 1),
    category: 'Uncategorized',
    rawCategory: null,
    tags: '[]',
    enrichmentStatus: 'fast',
    position,
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

export function seedFile(store: TransactionStore, fileHash: string, count: number): void {
  const rows = Array.from({ length: count }, (_, position) => makeRow(fileHash, position));
  store.insertFile(
    { id: `file-${fileHash}`, filename: `${fileHash}.csv`, fileHash, source: 'chase-csv', uploadedAt: '2024-05-01T00:00:00.000Z' },
    rows
  );
}
