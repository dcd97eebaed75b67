import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  TRANSACTION_CATEGORIES,
  UNCATEGORIZED,
  type TransactionCandidate,
  type TransactionCategory,
} from '../types/statements.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DATA_DIR = path.join(__dirname, '../../data');

interface CategoryRule {
  patterns: RegExp[];
  category: TransactionCategory;
}

export interface CategoryRuleSet {
  // Description rules, in priority order: subscriptions first, then merchants
  merchantRules: CategoryRule[];
  // Applied to the institution's own category label when no merchant matched
  rawCategoryRules: CategoryRule[];
}

const categorySchema = z.enum(TRANSACTION_CATEGORIES);

const ruleFileSchema = z.object({
  subscriptions: z.array(z.string().min(1)),
  merchants: z.array(z.object({
    category: categorySchema,
    keywords: z.array(z.string().min(1)),
  })),
  rawCategories: z.array(z.object({
    keyword: z.string().min(1),
    category: categorySchema,
  })),
});

/**
 * Case-insensitive keyword match that does not fire inside a longer word:
 * "cava" matches "CAVA GRILL" but not "EXCAVATION".
 */
export function keywordPattern(keyword: string): RegExp {
  const escaped = keyword.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`, 'i');
}

export function normalizeForMatching(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function loadCategoryRules(filePath = path.join(DATA_DIR, 'category-rules.json')): CategoryRuleSet {
  const file = ruleFileSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));

  return {
    merchantRules: [
      { patterns: file.subscriptions.map(keywordPattern), category: 'Subscriptions' },
      ...file.merchants.map((rule) => ({
        patterns: rule.keywords.map(keywordPattern),
        category: rule.category,
      })),
    ],
    rawCategoryRules: file.rawCategories.map((rule) => ({
      patterns: [keywordPattern(rule.keyword)],
      category: rule.category,
    })),
  };
}

let defaultRules: CategoryRuleSet | null = null;

export function getCategoryRules(): CategoryRuleSet {
  if (!defaultRules) {
    defaultRules = loadCategoryRules();
  }
  return defaultRules;
}

function firstMatch(rules: CategoryRule[], text: string): TransactionCategory | null {
  for (const rule of rules) {
    if (rule.patterns.some((pattern) => pattern.test(text))) {
      return rule.category;
    }
  }
  return null;
}

/**
 * Fast, synchronous categorization used at upload time. First matching rule
 * wins; anything unmatched is Uncategorized until enrichment revisits it.
 */
export function categorize(
  transaction: Pick<TransactionCandidate, 'description' | 'rawCategory'>,
  rules: CategoryRuleSet = getCategoryRules()
): TransactionCategory {
  const fromMerchant = firstMatch(rules.merchantRules, normalizeForMatching(transaction.description));
  if (fromMerchant) return fromMerchant;

  if (transaction.rawCategory) {
    const fromRaw = firstMatch(rules.rawCategoryRules, normalizeForMatching(transaction.rawCategory));
    if (fromRaw) return fromRaw;
  }

  return UNCATEGORIZED;
}
