import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import multer from 'multer';
import { ZodError } from 'zod';

import type { AppConfig } from './config.js';
import { AppError, ParseError, errorMessage } from './errors.js';
import { createTransactionsRouter } from './routes/transactions.js';
import { createUploadsRouter, type UploadsRouterDependencies } from './routes/uploads.js';

export interface AppDependencies extends UploadsRouterDependencies {
  server: AppConfig['server'];
}

function errorStatus(err: unknown): number {
  if (err instanceof AppError) return err.status;
  if (err instanceof ZodError || err instanceof multer.MulterError) return 400;
  return 500;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const { isProduction, frontendUrl } = deps.server;

  app.use(helmet({
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    contentSecurityPolicy: isProduction ? undefined : false,
  }));
  app.use(cors({
    origin: frontendUrl
      ? [frontendUrl]
      : ['http://localhost:5173', 'http://127.0.0.1:5173'],
    credentials: true,
  }));
  app.use(compression({
    // Buffered compression would hold back server-sent events
    filter: (req, res) => req.path.endsWith('/progress') ? false : compression.filter(req, res),
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api/uploads', createUploadsRouter(deps));
  app.use('/api/transactions', createTransactionsRouter(deps.store));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      transactions: deps.store.countTransactions(),
      enrichment: deps.worker ? 'enabled' : 'disabled',
      timestamp: new Date().toISOString(),
    });
  });

  // Error handling middleware
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = errorStatus(err);
    if (status >= 500) {
      console.error('Error:', err);
    } else {
      console.warn(`[HTTP] ${status}: ${errorMessage(err)}`);
    }

    if (err instanceof ZodError) {
      return res.status(status).json({ error: 'Invalid request', details: err.issues });
    }
    res.status(status).json({
      error: status >= 500 && !(err instanceof AppError) ? 'Internal server error' : errorMessage(err),
      ...(err instanceof ParseError && err.row !== null ? { row: err.row } : {}),
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
