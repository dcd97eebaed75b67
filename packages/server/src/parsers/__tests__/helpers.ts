import type { TransactionCandidate } from '../../types/statements.js';
import { StatementDocument } from '../statement-document.js';
import { createParseContext, type ParseContext, type StatementParser } from '../types.js';

export function csvDocument(lines: string[], filename = 'activity.csv'): StatementDocument {
  return new StatementDocument(Buffer.from(lines.join('\n'), 'utf-8'), filename);
}

// Bytes are irrelevant: the extractor hands back the given text
export function pdfDocument(lines: string[], filename = 'statement.pdf'): StatementDocument {
  const text = lines.join('\n');
  return new StatementDocument(Buffer.from('%PDF-1.4\n'), filename, async () => text);
}

export async function collect(
  parser: StatementParser,
  document: StatementDocument,
  context: ParseContext = createParseContext()
): Promise<TransactionCandidate[]> {
  const candidates: TransactionCandidate[] = [];
  for await (const candidate of parser.parse(document, context)) {
    candidates.push(candidate);
  }
  return candidates;
}
