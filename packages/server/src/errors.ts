/**
 * Error taxonomy shared by the ingestion path, the enrichment worker and the
 * HTTP layer. The error middleware reads `status` off any thrown error.
 */

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

// No parser claims the file
export class UnrecognizedFormatError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ParseError extends AppError {
  readonly row: number | null;

  constructor(message: string, row: number | null = null) {
    super(row === null ? message : `Row ${row}: ${message}`, 422);
    this.row = row;
  }
}

// Transient: backend unreachable, rate limited or failing
export class ClassifierUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

// The model answered, but not in a shape we can use
export class MalformedResponseError extends AppError {
  readonly raw: string;

  constructor(message: string, raw = '') {
    super(message, 502);
    this.raw = raw;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
