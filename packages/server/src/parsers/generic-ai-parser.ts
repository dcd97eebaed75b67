import { z } from 'zod';
import { ParseError, MalformedResponseError, errorMessage } from '../errors.js';
import type { CompletionClient } from '../services/llm-client.js';
import { parseJsonReply } from '../services/llm-client.js';
import type { TransactionCandidate } from '../types/statements.js';
import type { StatementDocument } from './statement-document.js';
import type { ParseContext, StatementParser } from './types.js';
import {
  US_DATE_FORMATS,
  cleanDescription,
  isLikelyPayment,
  isValidDescription,
  parseAmount,
  parseStatementDate,
} from './validation.js';

export const CSV_BATCH_ROWS = 50;
export const PDF_BATCH_CHARS = 1500;
export const MAX_BATCHES_IN_FLIGHT = 3;
const PREVIEW_CHARS = 2000;

const ITEM_DATE_FORMATS = ['YYYY-MM-DD', ...US_DATE_FORMATS];

export interface DocumentMetadata {
  institution: string;
  statementYear: number | null;
  statementPeriod: string | null;
  documentType: string;
}

const metadataSchema = z.object({
  institution: z.string().default('unknown'),
  statement_year: z.number().int().nullable().default(null),
  statement_period: z.string().nullable().default(null),
  document_type: z.string().default('unknown'),
});

const extractionSchema = z.object({
  transactions: z.array(z.unknown()),
});

const itemSchema = z.object({
  date: z.string(),
  description: z.string(),
  amount: z.union([z.number(), z.string()]),
  raw_category: z.string().nullable().optional(),
});

const UNKNOWN_METADATA: DocumentMetadata = {
  institution: 'unknown',
  statementYear: null,
  statementPeriod: null,
  documentType: 'unknown',
};

function buildMetadataPrompt(preview: string): string {
  return `Analyze this financial statement and extract metadata.

Document preview:
${preview}

Respond with JSON only:
{
  "institution": "name of the bank or card issuer, or \\"unknown\\"",
  "statement_year": 2024,
  "statement_period": "December 2024",
  "document_type": "monthly_statement" | "year_end_summary" | "transaction_export"
}

The year must come from the statement's own dates, not today's date. Use null when it cannot be determined.`;
}

function buildExtractionPrompt(metadata: DocumentMetadata, batch: string, batchNumber: number, batchCount: number): string {
  const year = metadata.statementYear ?? 'unknown';
  return `Extract financial transactions from this statement data.

Institution: ${metadata.institution}
Statement Period: ${metadata.statementPeriod ?? 'unknown'}
Statement Year: ${year}

Data (batch ${batchNumber} of ${batchCount}):
${batch}

Rules:
1. Purchases and fees are NEGATIVE amounts; refunds and credits are POSITIVE.
2. Skip card payments ("Payment - Thank You", "Autopay"), balance transfers, totals and summaries.
3. Dates are YYYY-MM-DD. A date without a year takes the statement year.
4. raw_category is the category printed on the statement, or null.

Respond with JSON only: {"transactions": [{"date": "2024-12-01", "description": "STARBUCKS", "amount": -5.50, "raw_category": null}]}`;
}

/**
 * CSV batches keep whole rows and repeat the header; PDF batches are cut at
 * line boundaries so no row is split between two requests.
 */
export function splitIntoBatches(kind: 'csv' | 'pdf', text: string): string[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length === 0) return [];

  const batches: string[] = [];

  if (kind === 'csv') {
    const [header, ...dataLines] = lines;
    for (let i = 0; i < dataLines.length; i += CSV_BATCH_ROWS) {
      batches.push([header, ...dataLines.slice(i, i + CSV_BATCH_ROWS)].join('\n'));
    }
    return batches;
  }

  let current: string[] = [];
  let size = 0;
  for (const line of lines) {
    if (current.length > 0 && size + line.length + 1 > PDF_BATCH_CHARS) {
      batches.push(current.join('\n'));
      current = [];
      size = 0;
    }
    current.push(line);
    size += line.length + 1;
  }
  if (current.length > 0) {
    batches.push(current.join('\n'));
  }
  return batches;
}

async function analyzeDocument(client: CompletionClient, preview: string): Promise<DocumentMetadata> {
  try {
    const reply = await client.complete(buildMetadataPrompt(preview), { maxTokens: 512 });
    const parsed = metadataSchema.safeParse(parseJsonReply(reply));
    if (!parsed.success) {
      throw new MalformedResponseError(`Unexpected metadata shape: ${parsed.error.message}`, reply);
    }
    return {
      institution: parsed.data.institution,
      statementYear: parsed.data.statement_year,
      statementPeriod: parsed.data.statement_period,
      documentType: parsed.data.document_type,
    };
  } catch (err) {
    // Extraction can still work without metadata; an outage will surface there
    if (err instanceof MalformedResponseError) {
      console.warn(`[GenericParser] Document analysis failed, continuing without metadata: ${err.message}`);
      return UNKNOWN_METADATA;
    }
    throw err;
  }
}

async function extractBatch(
  client: CompletionClient,
  metadata: DocumentMetadata,
  batch: string,
  batchNumber: number,
  batchCount: number
): Promise<unknown[]> {
  const prompt = buildExtractionPrompt(metadata, batch, batchNumber, batchCount);
  const reply = await client.complete(prompt, { maxTokens: 4096 });

  let json: unknown;
  try {
    json = parseJsonReply(reply);
  } catch (err) {
    throw new ParseError(`Batch ${batchNumber}/${batchCount}: ${errorMessage(err)}`);
  }

  const parsed = extractionSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Batch ${batchNumber}/${batchCount}: reply has no "transactions" array`);
  }
  return parsed.data.transactions;
}

function toCandidate(item: unknown, { stats }: ParseContext): TransactionCandidate | null {
  const parsed = itemSchema.safeParse(item);
  if (!parsed.success) {
    stats.warnings.push(`Skipped extracted item with missing fields: ${JSON.stringify(item)}`);
    return null;
  }

  const { date: dateStr, description: rawDescription, amount: rawAmount, raw_category } = parsed.data;
  const date = parseStatementDate(dateStr, ITEM_DATE_FORMATS);
  const amount = parseAmount(rawAmount);
  const description = cleanDescription(rawDescription);

  if (!date || amount === null || amount === 0 || !isValidDescription(description)) {
    stats.warnings.push(`Skipped invalid extracted transaction: ${dateStr} "${rawDescription}" ${rawAmount}`);
    return null;
  }

  return { date, description, amount, rawCategory: raw_category ?? null };
}

/**
 * LLM-backed fallback for statements no layout-specific parser recognizes.
 */
export function createGenericAiParser(client: CompletionClient): StatementParser {
  async function* parseGeneric(
    document: StatementDocument,
    context: ParseContext
  ): AsyncGenerator<TransactionCandidate> {
    const { stats } = context;
    const text = await document.text();
    if (!text.trim()) {
      throw new ParseError('Document has no extractable text');
    }

    const metadata = await analyzeDocument(client, text.slice(0, PREVIEW_CHARS));
    console.log(`[GenericParser] ${document.filename}: institution=${metadata.institution}, year=${metadata.statementYear ?? 'unknown'}`);

    const batches = splitIntoBatches(document.kind === 'csv' ? 'csv' : 'pdf', text);
    console.log(`[GenericParser] Extracting ${batches.length} batches`);

    const seen = new Set<string>();

    for (let start = 0; start < batches.length; start += MAX_BATCHES_IN_FLIGHT) {
      const group = batches.slice(start, start + MAX_BATCHES_IN_FLIGHT);
      const results = await Promise.all(
        group.map((batch, offset) => extractBatch(client, metadata, batch, start + offset + 1, batches.length))
      );

      for (const items of results) {
        for (const item of items) {
          stats.rowsProcessed++;
          const candidate = toCandidate(item, context);
          if (!candidate) {
            stats.rowsSkipped++;
            continue;
          }

          if (isLikelyPayment(candidate.description, candidate.rawCategory)) {
            stats.paymentsFiltered++;
            continue;
          }

          // Overlapping batches can return the same row twice
          const key = `${candidate.date}|${candidate.description}|${candidate.amount}`;
          if (seen.has(key)) {
            stats.rowsSkipped++;
            continue;
          }
          seen.add(key);

          yield candidate;
        }
      }
    }
  }

  return {
    source: 'generic-ai',
    kind: 'ai',
    parse: parseGeneric,
  };
}
