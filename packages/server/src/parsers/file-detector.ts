/**
 * Auto-detect the institution and layout of an uploaded statement
 */

import { UnrecognizedFormatError } from '../errors.js';
import type { StatementSource } from '../types/statements.js';
import type { StatementDocument } from './statement-document.js';

export interface DetectionResult {
  source: StatementSource;
  confidence: 'high' | 'low';
  details: string;
}

export interface DetectOptions {
  // True when an LLM is configured to handle unknown layouts
  allowGeneric: boolean;
}

const HEADER_SCAN_ROWS = 10;

function headerRows(rows: string[][]): string[][] {
  return rows.slice(0, HEADER_SCAN_ROWS).map((row) => row.map((cell) => cell.toLowerCase().trim()));
}

function anyRowHas(rows: string[][], ...columns: string[]): boolean {
  return rows.some((row) => columns.every((column) => row.includes(column)));
}

function detectCsv(rows: string[][], text: string): DetectionResult | null {
  const headers = headerRows(rows);

  if (anyRowHas(headers, 'transaction date', 'post date', 'description', 'amount')) {
    return { source: 'chase-csv', confidence: 'high', details: 'Chase card activity export detected' };
  }

  const coinbaseHeader = headers.some((row) =>
    row.includes('timestamp') && ['asset', 'transaction type', 'usd'].some((c) => row.includes(c))
  );
  if (coinbaseHeader || (anyRowHas(headers, 'timestamp') && text.includes('coinbase'))) {
    return { source: 'coinbase-csv', confidence: 'high', details: 'Coinbase Card export detected' };
  }

  const amexHeader = headers.some((row) =>
    row.includes('date') && row.includes('description') && row.includes('amount')
    && ['card member', 'account #', 'reference', 'extended details'].some((c) => row.includes(c))
  );
  const amexBranded = anyRowHas(headers, 'date', 'description', 'amount')
    && (text.includes('american express') || text.includes('amex'));
  if (amexHeader || amexBranded) {
    return { source: 'amex-csv', confidence: 'high', details: 'American Express activity export detected' };
  }

  return null;
}

function detectPdf(text: string): DetectionResult | null {
  if (text.includes('spending report') || text.includes('spending by category')) {
    return { source: 'chase-report-pdf', confidence: 'high', details: 'Chase spending report detected' };
  }

  if (text.includes('year-end summary') && (text.includes('includes charges from') || text.includes('prepared for'))) {
    return { source: 'amex-year-end-pdf', confidence: 'high', details: 'American Express year-end summary detected' };
  }

  if (text.includes('coinbase') && text.includes('card')) {
    return { source: 'coinbase-pdf', confidence: 'high', details: 'Coinbase Card statement detected' };
  }

  if (text.includes('chase') && (
    text.includes('account activity')
    || text.includes('statement date')
    || text.includes('opening/closing date')
  )) {
    return { source: 'chase-pdf', confidence: 'high', details: 'Chase credit card statement detected' };
  }

  return null;
}

/**
 * Pick the parser variant for a document from its content alone; the
 * filename only decides between CSV and PDF.
 */
export async function detectSource(document: StatementDocument, options: DetectOptions): Promise<DetectionResult> {
  if (document.kind === 'unknown') {
    throw new UnrecognizedFormatError(`Unsupported file type: ${document.filename}`);
  }

  const text = (await document.text()).toLowerCase();
  if (!text.trim()) {
    throw new UnrecognizedFormatError(`No extractable text in ${document.filename}`);
  }

  const match = document.kind === 'csv'
    ? detectCsv(await document.rows(), text)
    : detectPdf(text);

  if (match) {
    console.log(`[Detector] ${document.filename}: ${match.details}`);
    return match;
  }

  if (options.allowGeneric) {
    console.log(`[Detector] ${document.filename}: layout not recognized, using AI extraction`);
    return {
      source: 'generic-ai',
      confidence: 'low',
      details: 'Unrecognized layout, extracting with the language model',
    };
  }

  throw new UnrecognizedFormatError(
    `Statement layout not recognized for ${document.filename}. Supported: Chase, American Express and Coinbase statements`
  );
}
