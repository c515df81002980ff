import { Router } from 'express';
import { QuoteService } from '@/services/quote.service';
import { createQuotesController } from '@/controllers/quotes.controller';
import { createQuotesRouter } from './quotes.routes';

/**
 * API Routes
 * Base path: /api
 *
 * Unversioned: workflow tools call these paths directly.
 * No authentication: the gateway is meant to run next to its callers.
 */
export function createApiRouter(quoteService: QuoteService): Router {
  const router = Router();

  router.use(createQuotesRouter(createQuotesController(quoteService)));

  return router;
}
