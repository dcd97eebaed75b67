import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Server } from 'http';
import { z } from 'zod';
import { createApp } from '../app.js';
import { createParserRegistry } from '../parsers/index.js';
import { computeFileHash } from '../services/dedup-service.js';
import { EnrichmentWorker } from '../services/enrichment-worker.js';
import { IngestionService } from '../services/ingestion-service.js';
import type { Classification, TransactionClassifier } from '../services/llm-classifier.js';
import { ProgressTracker } from '../services/progress-service.js';
import type { TransactionStore } from '../services/transaction-store.js';
import { createTestStore } from '../services/__tests__/helpers.js';

const CHASE_CSV = [
  'Transaction Date,Post Date,Description,Category,Type,Amount,Memo',
  '01/05/2024,01/06/2024,STARBUCKS STORE 123,Food & Drink,Sale,-5.75,',
  '01/07/2024,01/08/2024,SHELL OIL 5744,Gas,Sale,-40.00,',
].join('\n');

const CHASE_FILE_HASH = computeFileHash(Buffer.from(CHASE_CSV));

const progressEventSchema = z.object({
  status: z.string(),
  processed: z.number(),
  total: z.number(),
});

function uploadForm(content: string, filename: string): FormData {
  const form = new FormData();
  form.append('file', new Blob([content]), filename);
  return form;
}

function readEvents(body: string) {
  return body
    .split('\n\n')
    .filter((chunk) => chunk.startsWith('data: '))
    .map((chunk) => progressEventSchema.parse(JSON.parse(chunk.slice('data: '.length))));
}

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

// Holds every classification until release() is called
class GatedClassifier implements TransactionClassifier {
  release: () => void = () => {};
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async classify(): Promise<Classification> {
    await this.gate;
    return { category: 'Food & Dining', tags: ['test'] };
  }
}

type WorkerFactory = (store: TransactionStore, progress: ProgressTracker) => EnrichmentWorker;

async function startServer(createWorker?: WorkerFactory) {
  const store = createTestStore();
  const progress = new ProgressTracker();
  const worker = createWorker ? createWorker(store, progress) : null;
  const ingestion = new IngestionService({
    store,
    parsers: createParserRegistry(),
    progress,
    enrichment: worker,
  });
  const app = createApp({
    server: { port: 0, isProduction: false },
    ingestion,
    store,
    progress,
    worker,
  });

  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind to a port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}`, progress, worker };
}

async function stopServer(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let progress: ProgressTracker;

  beforeEach(async () => {
    ({ server, baseUrl, progress } = await startServer());
  });

  afterEach(async () => {
    await stopServer(server);
  });

  it('should report health with enrichment disabled', async () => {
    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', transactions: 0, enrichment: 'disabled' });
  });

  it('should ingest an uploaded statement and list its transactions', async () => {
    const upload = await fetch(`${baseUrl}/api/uploads`, {
      method: 'POST',
      body: uploadForm(CHASE_CSV, 'activity.csv'),
    });

    expect(upload.status).toBe(200);
    expect(await upload.json()).toMatchObject({
      status: 'added',
      source: 'chase-csv',
      transactionsAdded: 2,
      enrichment: 'not-needed',
    });

    const list = await fetch(`${baseUrl}/api/transactions`);
    expect(await list.json()).toHaveLength(2);
  });

  it('should report a repeated upload as a duplicate', async () => {
    await fetch(`${baseUrl}/api/uploads`, { method: 'POST', body: uploadForm(CHASE_CSV, 'activity.csv') });
    const second = await fetch(`${baseUrl}/api/uploads`, {
      method: 'POST',
      body: uploadForm(CHASE_CSV, 'activity-copy.csv'),
    });

    expect(second.status).toBe(200);
    expect(await second.json()).toMatchObject({ status: 'duplicate', transactionsAdded: 0 });
  });

  it('should answer an unreadable PDF with 400 and the cause', async () => {
    const res = await fetch(`${baseUrl}/api/uploads`, {
      method: 'POST',
      body: uploadForm('this is not really a pdf, just text', 'statement.pdf'),
    });

    expect(res.status).toBe(400);
    const body = z.object({ error: z.string() }).parse(await res.json());
    expect(body.error).toMatch(/^Could not read PDF statement\.pdf: /);
  });

  it('should reject files that are not PDF or CSV', async () => {
    const res = await fetch(`${baseUrl}/api/uploads`, {
      method: 'POST',
      body: uploadForm('hello', 'notes.txt'),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid file type. Allowed: PDF, CSV' });
  });

  it('should reject a request without a file', async () => {
    const res = await fetch(`${baseUrl}/api/uploads`, { method: 'POST', body: new FormData() });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'No file uploaded' });
  });

  it('should refuse manual enrichment when no LLM is configured', async () => {
    const res = await fetch(`${baseUrl}/api/uploads/abc/enrich`, { method: 'POST' });

    expect(res.status).toBe(503);
  });

  it('should send the latest snapshot and close when the upload already finished', async () => {
    await fetch(`${baseUrl}/api/uploads`, { method: 'POST', body: uploadForm(CHASE_CSV, 'activity.csv') });

    const res = await fetch(`${baseUrl}/api/uploads/${CHASE_FILE_HASH}/progress`);

    expect(res.headers.get('content-type')).toMatch(/^text\/event-stream/);
    expect(readEvents(await res.text())).toEqual([{ status: 'complete', processed: 2, total: 2 }]);
    expect(progress.listenerCount(CHASE_FILE_HASH)).toBe(0);
  });

  it('should validate transaction filters', async () => {
    const res = await fetch(`${baseUrl}/api/transactions?limit=0`);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Invalid request' });
  });

  it('should answer unknown routes with 404', async () => {
    const res = await fetch(`${baseUrl}/api/nothing-here`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('HTTP API with enrichment', () => {
  let server: Server;
  let baseUrl: string;
  let progress: ProgressTracker;
  let worker: EnrichmentWorker;
  let classifier: GatedClassifier;

  beforeEach(async () => {
    classifier = new GatedClassifier();
    const started = await startServer((store, tracker) => new EnrichmentWorker(store, classifier, tracker));
    if (!started.worker) {
      throw new Error('Worker was not created');
    }
    ({ server, baseUrl, progress } = started);
    worker = started.worker;
  });

  afterEach(async () => {
    classifier.release();
    await worker.shutdown();
    await stopServer(server);
  });

  async function uploadStatement() {
    const res = await fetch(`${baseUrl}/api/uploads`, {
      method: 'POST',
      body: uploadForm(CHASE_CSV, 'activity.csv'),
    });
    expect(await res.json()).toMatchObject({ status: 'added', enrichment: 'queued' });
  }

  it('should stream progress until the job completes', async () => {
    await uploadStatement();

    const res = await fetch(`${baseUrl}/api/uploads/${CHASE_FILE_HASH}/progress`);
    classifier.release();
    const events = readEvents(await res.text());

    expect(events.at(-1)).toEqual({ status: 'complete', processed: 2, total: 2 });
    expect(events.slice(0, -1).every((event) => event.status === 'queued' || event.status === 'processing'))
      .toBe(true);
    expect(progress.listenerCount(CHASE_FILE_HASH)).toBe(0);
  });

  it('should keep the job running when the client disconnects', async () => {
    await uploadStatement();

    const controller = new AbortController();
    await fetch(`${baseUrl}/api/uploads/${CHASE_FILE_HASH}/progress`, { signal: controller.signal });
    expect(progress.listenerCount(CHASE_FILE_HASH)).toBe(1);

    controller.abort();
    await waitFor(() => progress.listenerCount(CHASE_FILE_HASH) === 0);
    expect(worker.hasActiveJobs()).toBe(true);

    classifier.release();
    await worker.whenIdle();

    expect(worker.getJob(CHASE_FILE_HASH)).toMatchObject({ status: 'complete', processed: 2 });
  });

  it('should refuse a second enrichment while one is running, then accept it', async () => {
    await uploadStatement();

    const busy = await fetch(`${baseUrl}/api/uploads/${CHASE_FILE_HASH}/enrich`, { method: 'POST' });
    expect(busy.status).toBe(409);

    classifier.release();
    await worker.whenIdle();

    const started = await fetch(`${baseUrl}/api/uploads/${CHASE_FILE_HASH}/enrich`, { method: 'POST' });
    expect(started.status).toBe(202);
    expect(await started.json()).toEqual({ message: 'Enrichment started', fileHash: CHASE_FILE_HASH });
  });

  it('should answer 404 when enriching an unknown file', async () => {
    const res = await fetch(`${baseUrl}/api/uploads/unknown-hash/enrich`, { method: 'POST' });

    expect(res.status).toBe(404);
  });
});
