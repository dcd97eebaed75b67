import { Router } from 'express';
import { z } from 'zod';
import { recategorizeFastPath, retagUntagged } from '../services/maintenance-service.js';
import type { TransactionStore } from '../services/transaction-store.js';
import { STATEMENT_SOURCES, TRANSACTION_CATEGORIES } from '../types/statements.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

// Query params schema
const querySchema = z.object({
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  category: z.enum(TRANSACTION_CATEGORIES).optional(),
  source: z.enum(STATEMENT_SOURCES).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export function createTransactionsRouter(store: TransactionStore): Router {
  const router = Router();

  // List transactions, newest first
  router.get('/', (req, res, next) => {
    try {
      const query = querySchema.parse(req.query);
      res.json(store.listTransactions(query));
    } catch (error) {
      next(error);
    }
  });

  // Re-apply category rules to rows enrichment has not reached
  router.post('/recategorize', (_req, res, next) => {
    try {
      res.json(recategorizeFastPath(store));
    } catch (error) {
      next(error);
    }
  });

  // Tag rows that have no tags yet
  router.post('/retag', (_req, res, next) => {
    try {
      res.json(retagUntagged(store));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
