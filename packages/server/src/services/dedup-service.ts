import crypto from 'crypto';
import type { StatementSource, TransactionCandidate } from '../types/statements.js';

const repeatingWhitespace = /\s+/g;
const asterisks = /\*/g;
// XX1234, xxxx1234, "ending in 1234"
const maskedCard = /\b(?:x{2,}\d{4}|ending in\s*\d{4})\b/g;
// #123 store numbers
const storeNumber = /#\s*\d+/g;
// Long reference numbers banks append to the memo
const trailingReference = /(?:\s+\d{10,})+$/;

/**
 * Reduces a merchant description to the form used for dedup, so that
 * re-exports with cosmetic differences still hash the same.
 */
export function normalizeDescription(description: string): string {
  return description
    .toLowerCase()
    .replace(asterisks, ' ')
    .replace(maskedCard, ' ')
    .replace(storeNumber, ' ')
    .replace(repeatingWhitespace, ' ')
    .trim()
    .replace(trailingReference, '')
    .trim();
}

export function computeFileHash(bytes: Buffer): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

export function computeTransactionHash(
  source: StatementSource,
  date: string,
  description: string,
  amount: number
): string {
  const serialized = [
    source,
    date,
    normalizeDescription(description),
    amount.toFixed(2),
  ].join('|');

  return crypto.createHash('sha256').update(serialized).digest('hex');
}

export interface HashedCandidate extends TransactionCandidate {
  transactionHash: string;
}

export function hashCandidates(
  source: StatementSource,
  candidates: TransactionCandidate[]
): HashedCandidate[] {
  return candidates.map((candidate) => ({
    ...candidate,
    transactionHash: computeTransactionHash(source, candidate.date, candidate.description, candidate.amount),
  }));
}

/**
 * Drops candidates whose hash is already stored for the source, and repeats
 * of a hash within the same batch.
 */
export function filterNew<T extends { transactionHash: string }>(
  candidates: T[],
  existingHashes: ReadonlySet<string>
): { fresh: T[]; skipped: number } {
  const seen = new Set<string>();
  const fresh: T[] = [];
  let skipped = 0;

  for (const candidate of candidates) {
    if (existingHashes.has(candidate.transactionHash) || seen.has(candidate.transactionHash)) {
      skipped++;
      continue;
    }
    seen.add(candidate.transactionHash);
    fresh.push(candidate);
  }

  return { fresh, skipped };
}
