import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db/index.js';
import { createParserRegistry } from './parsers/index.js';
import { EnrichmentWorker } from './services/enrichment-worker.js';
import { IngestionService } from './services/ingestion-service.js';
import { createCompletionClient } from './services/llm-client.js';
import { LlmTransactionClassifier } from './services/llm-classifier.js';
import { ProgressTracker } from './services/progress-service.js';
import { TransactionStore } from './services/transaction-store.js';

const config = loadConfig();

const { sqlite, db } = openDatabase(config.database.path);
const store = new TransactionStore(db);
const progress = new ProgressTracker(config.progress.ttlMs);

const completion = createCompletionClient(config.llm);
const worker = completion
  ? new EnrichmentWorker(store, new LlmTransactionClassifier(completion), progress, config.enrichment)
  : null;

const ingestion = new IngestionService({
  store,
  parsers: createParserRegistry({ completion }),
  progress,
  enrichment: worker,
});

const app = createApp({ server: config.server, ingestion, store, progress, worker });

const server = app.listen(config.server.port, () => {
  console.log(`Statement ingest server running on http://localhost:${config.server.port}`);
  console.log(`Database: ${config.database.path}`);
});

async function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close();
  if (worker) {
    await worker.shutdown();
  }
  sqlite.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => {
      console.error('[Server] Shutdown failed:', err);
      process.exit(1);
    });
  });
}
