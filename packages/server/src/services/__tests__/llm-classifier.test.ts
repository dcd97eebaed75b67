import { describe, it, expect, vi } from 'vitest';
import { MalformedResponseError } from '../../errors.js';
import { LlmTransactionClassifier, buildClassificationPrompt, parseCategory } from '../llm-classifier.js';
import { parseJsonReply, type CompletionClient } from '../llm-client.js';

const transaction = {
  date: '2024-01-15',
  description: 'STARBUCKS STORE 123',
  amount: -5.75,
  rawCategory: 'Food & Drink',
};

function clientReplying(reply: string) {
  const complete = vi.fn<CompletionClient['complete']>(async () => reply);
  return { client: { complete }, complete };
}

describe('parseCategory', () => {
  it('should accept our own labels in any case', () => {
    expect(parseCategory('Food & Dining')).toBe('Food & Dining');
    expect(parseCategory(' groceries ')).toBe('Groceries');
  });

  it('should map near-miss labels by keyword', () => {
    expect(parseCategory('Restaurants')).toBe('Food & Dining');
    expect(parseCategory('Hotel stay')).toBe('Travel');
  });

  it('should never hand back Uncategorized', () => {
    expect(parseCategory('Uncategorized')).toBe('Other');
    expect(parseCategory('Something else entirely')).toBe('Other');
  });
});

describe('parseJsonReply', () => {
  it('should strip a markdown fence', () => {
    expect(parseJsonReply('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('should raise a malformed response error for prose', () => {
    expect(() => parseJsonReply('I think this is coffee')).toThrow(MalformedResponseError);
  });
});

describe('buildClassificationPrompt', () => {
  it('should describe the transaction', () => {
    const prompt = buildClassificationPrompt(transaction);
    expect(prompt).toContain('Description: STARBUCKS STORE 123');
    expect(prompt).toContain('Amount: $5.75 spent');
    expect(prompt).toContain("Institution's own category: Food & Drink");
  });
});

describe('LlmTransactionClassifier', () => {
  it('should return a category and normalized tags', async () => {
    const { client, complete } = clientReplying('{"category": "Food & Dining", "tags": ["Coffee", "cafe", "coffee"]}');

    const result = await new LlmTransactionClassifier(client).classify(transaction);

    expect(result).toEqual({ category: 'Food & Dining', tags: ['coffee', 'cafe'] });
    expect(complete).toHaveBeenCalledWith(expect.stringContaining('STARBUCKS STORE 123'), {
      signal: undefined,
      maxTokens: 256,
    });
  });

  it('should default missing tags to none', async () => {
    const { client } = clientReplying('{"category": "Travel"}');
    await expect(new LlmTransactionClassifier(client).classify(transaction))
      .resolves.toEqual({ category: 'Travel', tags: [] });
  });

  it('should reject a reply of the wrong shape', async () => {
    const { client } = clientReplying('{"label": "Travel"}');
    await expect(new LlmTransactionClassifier(client).classify(transaction))
      .rejects.toBeInstanceOf(MalformedResponseError);
  });
});
