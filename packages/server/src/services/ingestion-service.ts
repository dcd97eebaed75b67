import { v4 as uuidv4 } from 'uuid';
import type { NewTransaction } from '../db/index.js';
import { ParseError, UnrecognizedFormatError, errorMessage } from '../errors.js';
import {
  StatementDocument,
  createParseContext,
  detectSource,
  type ParseContext,
  type ParserRegistry,
  type PdfTextExtractor,
  type StatementParser,
} from '../parsers/index.js';
import type { StatementSource, TransactionCandidate } from '../types/statements.js';
import { categorize, getCategoryRules, type CategoryRuleSet } from './category-service.js';
import { computeFileHash, filterNew, hashCandidates } from './dedup-service.js';
import type { ProgressTracker } from './progress-service.js';
import { getTagRules, tag, type TagRule } from './tag-service.js';
import type { IngestionStore } from './transaction-store.js';

export interface UploadOutcome {
  status: 'added' | 'duplicate';
  filename: string;
  fileHash: string;
  source: StatementSource;
  transactionsAdded: number;
  transactionsSkipped: number;
  paymentsFiltered: number;
  message: string;
  enrichment: 'queued' | 'not-needed';
}

/** The part of the enrichment worker uploads talk to. */
export interface EnrichmentQueue {
  enqueue(fileHash: string, filename: string): boolean;
}

export interface IngestionDependencies {
  store: IngestionStore;
  parsers: ParserRegistry;
  progress: ProgressTracker;
  // Null when no LLM is configured
  enrichment: EnrichmentQueue | null;
  pdfText?: PdfTextExtractor;
  categoryRules?: CategoryRuleSet;
  tagRules?: TagRule[];
}

export const DUPLICATE_FILE_MESSAGE = 'This file has already been uploaded';

async function collectCandidates(
  parser: StatementParser,
  document: StatementDocument,
  context: ParseContext
): Promise<TransactionCandidate[]> {
  const candidates: TransactionCandidate[] = [];
  try {
    for await (const candidate of parser.parse(document, context)) {
      candidates.push(candidate);
    }
  } catch (err) {
    if (err instanceof ParseError) throw err;
    throw new ParseError(`Failed to parse ${document.filename}: ${errorMessage(err)}`);
  }
  return candidates;
}

/**
 * Upload pipeline: detect, parse, dedup, fast categorize, store, then hand
 * the file to background enrichment. The response never waits on the LLM.
 */
export class IngestionService {
  constructor(private readonly deps: IngestionDependencies) {}

  async ingest(buffer: Buffer, filename: string): Promise<UploadOutcome> {
    if (buffer.length === 0) {
      throw new UnrecognizedFormatError('Uploaded file is empty');
    }

    const fileHash = computeFileHash(buffer);
    const document = new StatementDocument(buffer, filename, this.deps.pdfText);

    try {
      return await this.process(document, fileHash);
    } catch (err) {
      console.error(`[Upload] ${filename} failed:`, errorMessage(err));
      this.deps.progress.publish({ fileHash, status: 'error', processed: 0, total: 0, message: errorMessage(err) });
      throw err;
    }
  }

  private async process(document: StatementDocument, fileHash: string): Promise<UploadOutcome> {
    const { store, parsers, progress } = this.deps;
    const { filename } = document;

    const detection = await detectSource(document, { allowGeneric: parsers.has('generic-ai') });
    const source = detection.source;
    const parser = parsers.get(source);
    if (!parser) {
      throw new UnrecognizedFormatError(`No parser available for ${source} statements`);
    }

    if (store.existingFileHash(fileHash)) {
      console.log(`[Upload] ${filename} already uploaded (${fileHash.substring(0, 8)})`);
      return this.duplicateOutcome(filename, fileHash, source);
    }

    progress.publish({ fileHash, status: 'processing', processed: 0, total: 0, message: `Parsing ${source} statement` });

    const context = createParseContext();
    const candidates = await collectCandidates(parser, document, context);
    const { stats } = context;
    for (const warning of stats.warnings) {
      console.warn(`[Upload] ${filename}: ${warning}`);
    }

    const { fresh, skipped } = filterNew(hashCandidates(source, candidates), store.existingHashes(source));

    const categoryRules = this.deps.categoryRules ?? getCategoryRules();
    const tagRules = this.deps.tagRules ?? getTagRules();
    const now = new Date().toISOString();

    const rows = fresh.map((candidate, position): NewTransaction => ({
      id: uuidv4(),
      source,
      sourceFileHash: fileHash,
      transactionHash: candidate.transactionHash,
      date: candidate.date,
      description: candidate.description,
      amount: candidate.amount,
      category: categorize(candidate, categoryRules),
      rawCategory: candidate.rawCategory,
      tags: JSON.stringify(tag(candidate, tagRules)),
      enrichmentStatus: 'fast',
      position,
      createdAt: now,
      updatedAt: now,
    }));

    const result = store.insertFile({ id: uuidv4(), filename, fileHash, source, uploadedAt: now }, rows);
    if (result.status === 'duplicate') {
      // Another upload of the same bytes committed first
      return this.duplicateOutcome(filename, fileHash, source);
    }

    const transactionsAdded = result.inserted;
    const transactionsSkipped = skipped + result.ignored;
    console.log(
      `[Upload] ${filename}: ${transactionsAdded} added, ${transactionsSkipped} duplicates, ${stats.paymentsFiltered} payments filtered`
    );

    let enrichment: UploadOutcome['enrichment'] = 'not-needed';
    if (transactionsAdded > 0 && this.deps.enrichment) {
      this.deps.enrichment.enqueue(fileHash, filename);
      enrichment = 'queued';
    } else {
      progress.publish({
        fileHash,
        status: 'complete',
        processed: transactionsAdded,
        total: transactionsAdded,
        message: 'Upload complete',
      });
    }

    return {
      status: 'added',
      filename,
      fileHash,
      source,
      transactionsAdded,
      transactionsSkipped,
      paymentsFiltered: stats.paymentsFiltered,
      message: transactionsAdded > 0
        ? `Successfully processed ${transactionsAdded} transactions (${transactionsSkipped} duplicates skipped)`
        : 'No new transactions found',
      enrichment,
    };
  }

  private duplicateOutcome(filename: string, fileHash: string, source: StatementSource): UploadOutcome {
    return {
      status: 'duplicate',
      filename,
      fileHash,
      source,
      transactionsAdded: 0,
      transactionsSkipped: 0,
      paymentsFiltered: 0,
      message: DUPLICATE_FILE_MESSAGE,
      enrichment: 'not-needed',
    };
  }
}
