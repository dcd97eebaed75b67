import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { TransactionCandidate } from '../types/statements.js';
import { DATA_DIR, keywordPattern, normalizeForMatching } from './category-service.js';

export interface TagRule {
  patterns: RegExp[];
  tags: string[];
}

const tagFileSchema = z.array(z.object({
  keywords: z.array(z.string().min(1)),
  tags: z.array(z.string().min(1)),
}));

export function loadTagRules(filePath = path.join(DATA_DIR, 'merchant-tags.json')): TagRule[] {
  const file = tagFileSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  return file.map((rule) => ({
    patterns: rule.keywords.map(keywordPattern),
    tags: normalizeTags(rule.tags),
  }));
}

let defaultRules: TagRule[] | null = null;

export function getTagRules(): TagRule[] {
  if (!defaultRules) {
    defaultRules = loadTagRules();
  }
  return defaultRules;
}

// Lowercase, trimmed, no blanks, no repeats; first occurrence keeps its place
export function normalizeTags(tags: Iterable<string>): string[] {
  const result: string[] = [];
  for (const tag of tags) {
    const clean = tag.toLowerCase().trim();
    if (clean && !result.includes(clean)) {
      result.push(clean);
    }
  }
  return result;
}

/**
 * Merchant tags for search. The first rule whose keyword appears in the
 * description supplies the tags.
 */
export function tag(
  transaction: Pick<TransactionCandidate, 'description'>,
  rules: TagRule[] = getTagRules()
): string[] {
  const text = normalizeForMatching(transaction.description);
  for (const rule of rules) {
    if (rule.patterns.some((pattern) => pattern.test(text))) {
      return [...rule.tags];
    }
  }
  return [];
}
