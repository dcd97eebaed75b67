import { z } from 'zod';
import { MalformedResponseError } from '../errors.js';
import { TRANSACTION_CATEGORIES, isTransactionCategory, type TransactionCategory } from '../types/statements.js';
import { parseJsonReply, type CompletionClient } from './llm-client.js';
import { normalizeTags } from './tag-service.js';

export interface ClassifiableTransaction {
  date: string;
  description: string;
  amount: number;
  rawCategory: string | null;
}

export interface Classification {
  category: TransactionCategory;
  tags: string[];
}

export interface TransactionClassifier {
  classify(transaction: ClassifiableTransaction, options?: { signal?: AbortSignal }): Promise<Classification>;
}

const CATEGORY_DESCRIPTIONS = `Available categories:
- Food & Dining: Restaurants, cafes, fast food, food delivery
- Shopping: Retail stores, online shopping, clothing, electronics, home goods
- Transportation: Rideshare, taxis, public transit, parking, tolls
- Entertainment: Movies, concerts, events, games
- Bills & Utilities: Electric, water, internet, phone, insurance
- Travel: Hotels, airlines, car rentals, vacation expenses
- Health: Pharmacies, doctors, hospitals, gyms
- Groceries: Supermarkets and grocery stores
- Gas: Gas stations and fuel
- Subscriptions: Recurring monthly or yearly services and memberships
- Income: Salary, refunds, cashback, rewards
- Transfer: Bank transfers, payment apps, payments to self
- Other: Anything that does not fit the categories above`;

const CATEGORY_KEYWORDS: Array<[string, TransactionCategory]> = [
  ['food', 'Food & Dining'],
  ['dining', 'Food & Dining'],
  ['restaurant', 'Food & Dining'],
  ['shop', 'Shopping'],
  ['retail', 'Shopping'],
  ['transport', 'Transportation'],
  ['entertain', 'Entertainment'],
  ['movie', 'Entertainment'],
  ['bill', 'Bills & Utilities'],
  ['utilit', 'Bills & Utilities'],
  ['travel', 'Travel'],
  ['hotel', 'Travel'],
  ['flight', 'Travel'],
  ['health', 'Health'],
  ['medical', 'Health'],
  ['pharmacy', 'Health'],
  ['grocer', 'Groceries'],
  ['supermarket', 'Groceries'],
  ['gas', 'Gas'],
  ['fuel', 'Gas'],
  ['subscription', 'Subscriptions'],
  ['membership', 'Subscriptions'],
  ['income', 'Income'],
  ['salary', 'Income'],
  ['refund', 'Income'],
  ['transfer', 'Transfer'],
  ['payment', 'Transfer'],
];

/**
 * Map a model's category label onto ours: exact, then case-insensitive, then
 * by keyword. Anything else is Other.
 */
export function parseCategory(label: string): TransactionCategory {
  const trimmed = label.trim();
  if (isTransactionCategory(trimmed) && trimmed !== 'Uncategorized') {
    return trimmed;
  }

  const lower = trimmed.toLowerCase();
  const exact = TRANSACTION_CATEGORIES.find((category) => category.toLowerCase() === lower);
  if (exact && exact !== 'Uncategorized') {
    return exact;
  }

  for (const [keyword, category] of CATEGORY_KEYWORDS) {
    if (lower.includes(keyword)) {
      return category;
    }
  }

  return 'Other';
}

const classificationReplySchema = z.object({
  category: z.string().min(1),
  tags: z.array(z.string()).default([]),
});

export function buildClassificationPrompt(transaction: ClassifiableTransaction): string {
  const direction = transaction.amount < 0 ? 'spent' : 'received';
  const rawCategory = transaction.rawCategory ? `\nInstitution's own category: ${transaction.rawCategory}` : '';

  return `Categorize this financial transaction and generate search tags for it.

${CATEGORY_DESCRIPTIONS}

Transaction:
Date: ${transaction.date}
Description: ${transaction.description}
Amount: $${Math.abs(transaction.amount).toFixed(2)} ${direction}${rawCategory}

Tags should be 3-6 lowercase keywords that would help find this transaction in a search:
merchant type, purchase category, attributes such as online or delivery, brand name variations.

Respond with ONLY a JSON object, no markdown, no explanation:
{"category": "<one category name from the list>", "tags": ["tag1", "tag2", "tag3"]}`;
}

export class LlmTransactionClassifier implements TransactionClassifier {
  constructor(private readonly client: CompletionClient) {}

  async classify(
    transaction: ClassifiableTransaction,
    options: { signal?: AbortSignal } = {}
  ): Promise<Classification> {
    const reply = await this.client.complete(buildClassificationPrompt(transaction), {
      signal: options.signal,
      maxTokens: 256,
    });

    const parsed = classificationReplySchema.safeParse(parseJsonReply(reply));
    if (!parsed.success) {
      throw new MalformedResponseError('Classifier reply is not {category, tags}', reply);
    }

    return {
      category: parseCategory(parsed.data.category),
      tags: normalizeTags(parsed.data.tags),
    };
  }
}
