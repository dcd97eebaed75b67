import type { CompletionClient } from '../services/llm-client.js';
import type { StatementSource } from '../types/statements.js';
import { amexCsvParser } from './amex-csv-parser.js';
import { amexYearEndPdfParser } from './amex-year-end-pdf-parser.js';
import { chaseCsvParser } from './chase-csv-parser.js';
import { chasePdfParser } from './chase-pdf-parser.js';
import { chaseReportPdfParser } from './chase-report-pdf-parser.js';
import { coinbaseCsvParser } from './coinbase-csv-parser.js';
import { coinbasePdfParser } from './coinbase-pdf-parser.js';
import { createGenericAiParser } from './generic-ai-parser.js';
import type { StatementParser } from './types.js';

export { detectSource, type DetectionResult, type DetectOptions } from './file-detector.js';
export { StatementDocument, type PdfTextExtractor } from './statement-document.js';
export { createParseContext, type ParseContext, type ParseStats, type StatementParser } from './types.js';

export type ParserRegistry = ReadonlyMap<StatementSource, StatementParser>;

const LAYOUT_PARSERS: StatementParser[] = [
  chaseCsvParser,
  chasePdfParser,
  chaseReportPdfParser,
  amexCsvParser,
  amexYearEndPdfParser,
  coinbaseCsvParser,
  coinbasePdfParser,
];

/**
 * Parser variant per source. The generic variant is only registered when a
 * completion client is available.
 */
export function createParserRegistry(options: { completion?: CompletionClient | null } = {}): ParserRegistry {
  const registry = new Map<StatementSource, StatementParser>(
    LAYOUT_PARSERS.map((parser) => [parser.source, parser])
  );
  if (options.completion) {
    const generic = createGenericAiParser(options.completion);
    registry.set(generic.source, generic);
  }
  return registry;
}
