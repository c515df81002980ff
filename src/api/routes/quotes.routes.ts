import { Router } from 'express';
import { QuotesController } from '@/controllers/quotes.controller';

/**
 * Market data routes, mounted at /api
 */
export function createQuotesRouter(controller: QuotesController): Router {
  const router = Router();

  /**
   * GET /api/fundamentals/:ticker
   * Valuation, profitability, dividend, growth and debt ratios
   */
  router.get('/fundamentals/:ticker', controller.getFundamentals);

  /**
   * GET /api/historical/:ticker?period=1y&interval=1d
   * OHLCV series, oldest first
   */
  router.get('/historical/:ticker', controller.getHistorical);

  /**
   * GET /api/quote/:ticker
   * OHLCV of the latest trading day
   */
  router.get('/quote/:ticker', controller.getQuote);

  return router;
}
