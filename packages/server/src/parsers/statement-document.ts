import { UnrecognizedFormatError, errorMessage } from '../errors.js';
import { readCsvRows } from './csv-reader.js';

export type DocumentKind = 'pdf' | 'csv' | 'unknown';

export type PdfTextExtractor = (buffer: Buffer) => Promise<string>;

export async function extractPdfText(buffer: Buffer): Promise<string> {
  // Loaded on demand so CSV-only paths never pull in pdf.js
  const { PDFParse } = await import('pdf-parse');
  const parser = new PDFParse({ data: buffer });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

export function decodeText(buffer: Buffer): string {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    // Not valid UTF-8: bank exports in Windows-1252 decode cleanly as Latin-1
    text = buffer.toString('latin1');
  }
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

function detectKind(buffer: Buffer, filename: string): DocumentKind {
  const ext = filename.toLowerCase().split('.').pop();
  if (buffer.subarray(0, 5).toString('latin1') === '%PDF-' || ext === 'pdf') {
    return 'pdf';
  }
  if (ext === 'csv') {
    return 'csv';
  }
  if (buffer.includes(0)) {
    return 'unknown';
  }
  const firstLine = decodeText(buffer.subarray(0, 4096)).split(/\r?\n/, 1)[0] ?? '';
  return firstLine.includes(',') || firstLine.includes('\t') ? 'csv' : 'unknown';
}

/**
 * An uploaded statement. Text extraction runs at most once and is shared by
 * the detector and the parser.
 */
export class StatementDocument {
  readonly kind: DocumentKind;
  private textPromise: Promise<string> | null = null;
  private csvRows: string[][] | null = null;

  constructor(
    readonly buffer: Buffer,
    readonly filename: string,
    private readonly pdfText: PdfTextExtractor = extractPdfText
  ) {
    this.kind = detectKind(buffer, filename);
  }

  text(): Promise<string> {
    if (!this.textPromise) {
      this.textPromise = this.kind === 'pdf'
        ? this.readPdf()
        : Promise.resolve(decodeText(this.buffer));
    }
    return this.textPromise;
  }

  // Corrupt, truncated or encrypted PDFs are a format problem, not a server fault
  private async readPdf(): Promise<string> {
    try {
      return await this.pdfText(this.buffer);
    } catch (err) {
      throw new UnrecognizedFormatError(`Could not read PDF ${this.filename}: ${errorMessage(err)}`);
    }
  }

  async lines(): Promise<string[]> {
    const text = await this.text();
    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async rows(): Promise<string[][]> {
    if (!this.csvRows) {
      this.csvRows = readCsvRows(await this.text());
    }
    return this.csvRows;
  }
}
