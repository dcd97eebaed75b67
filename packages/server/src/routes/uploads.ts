import { Router } from 'express';
import multer from 'multer';
import path from 'path';
import { AppError } from '../errors.js';
import type { EnrichmentWorker } from '../services/enrichment-worker.js';
import type { IngestionService } from '../services/ingestion-service.js';
import { isTerminal, type ProgressEvent, type ProgressTracker } from '../services/progress-service.js';
import type { TransactionStore } from '../services/transaction-store.js';

export interface UploadsRouterDependencies {
  ingestion: IngestionService;
  store: TransactionStore;
  progress: ProgressTracker;
  // Null when no LLM is configured
  worker: EnrichmentWorker | null;
}

const ALLOWED_EXTENSIONS = ['.pdf', '.csv'];

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 }, // 10MB limit
  fileFilter: (_req, file, cb) => {
    if (ALLOWED_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase())) {
      cb(null, true);
    } else {
      cb(new AppError('Invalid file type. Allowed: PDF, CSV', 400));
    }
  },
});

const HEARTBEAT_MS = 15_000;

export function createUploadsRouter({ ingestion, store, progress, worker }: UploadsRouterDependencies): Router {
  const router = Router();

  // Upload a statement
  router.post('/', upload.single('file'), async (req, res, next) => {
    try {
      if (!req.file || req.file.size === 0) {
        return res.status(400).json({ error: 'No file uploaded' });
      }

      const outcome = await ingestion.ingest(req.file.buffer, req.file.originalname);
      res.json(outcome);
    } catch (error) {
      next(error);
    }
  });

  // Uploaded files, newest first
  router.get('/files', (_req, res, next) => {
    try {
      res.json(store.listFiles());
    } catch (error) {
      next(error);
    }
  });

  // Enrichment jobs still visible to pollers
  router.get('/jobs', (_req, res) => {
    res.json({
      jobs: worker ? worker.listJobs() : [],
      hasActive: worker ? worker.hasActiveJobs() : false,
    });
  });

  // Re-run enrichment on whatever is still at fast-path status
  router.post('/:fileHash/enrich', (req, res, next) => {
    try {
      if (!worker) {
        return res.status(503).json({ error: 'Enrichment is disabled: no LLM configured' });
      }

      const file = store.findFile(req.params.fileHash);
      if (!file) {
        return res.status(404).json({ error: 'File not found' });
      }

      const started = worker.enqueue(file.fileHash, file.filename);
      if (!started) {
        return res.status(409).json({ error: 'Enrichment already running for this file' });
      }

      res.status(202).json({ message: 'Enrichment started', fileHash: file.fileHash });
    } catch (error) {
      next(error);
    }
  });

  // Server-sent progress events for one upload
  router.get('/:fileHash/progress', (req, res) => {
    const { fileHash } = req.params;

    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    const send = (event: ProgressEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    const latest = progress.get(fileHash);
    if (latest) {
      send(latest);
      if (isTerminal(latest.status)) {
        res.end();
        return;
      }
    }

    const heartbeat = setInterval(() => {
      res.write(': keep-alive\n\n');
    }, HEARTBEAT_MS);

    const unsubscribe = progress.subscribe(fileHash, (event) => {
      send(event);
      if (isTerminal(event.status)) {
        cleanup();
        res.end();
      }
    });

    function cleanup() {
      clearInterval(heartbeat);
      unsubscribe();
    }

    // Fires on client disconnect as well as after res.end(); the job keeps running
    res.on('close', cleanup);
  });

  return router;
}
