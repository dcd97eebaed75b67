import type { StatementSource, TransactionCandidate } from '../types/statements.js';
import type { StatementDocument } from './statement-document.js';

export interface ParseStats {
  rowsProcessed: number;
  rowsSkipped: number;
  paymentsFiltered: number;
  warnings: string[];
}

export interface ParseContext {
  stats: ParseStats;
}

/**
 * One variant per {institution, format} pair. The detector picks the variant;
 * `parse` lazily yields candidates or throws ParseError.
 */
export interface StatementParser {
  source: StatementSource;
  kind: 'csv' | 'pdf' | 'ai';
  parse(document: StatementDocument, context: ParseContext): AsyncIterable<TransactionCandidate>;
}

export function createParseContext(): ParseContext {
  return {
    stats: {
      rowsProcessed: 0,
      rowsSkipped: 0,
      paymentsFiltered: 0,
      warnings: [],
    },
  };
}
