import { Request, Response, NextFunction, RequestHandler } from 'express';
import { QuoteService } from '@/services/quote.service';
import { AppError, UpstreamRetrievalError, ValidationError } from '@/errors';
import {
  formatZodIssues,
  historicalQuerySchema,
  tickerParamsSchema,
} from '@/validators/quote.validator';

/**
 * Quotes Controller
 * Handles HTTP requests for the fundamentals, historical and quote endpoints
 */
export interface QuotesController {
  getFundamentals: RequestHandler;
  getHistorical: RequestHandler;
  getQuote: RequestHandler;
}

function parseTicker(req: Request): string {
  const result = tickerParamsSchema.safeParse(req.params);
  if (!result.success) {
    throw new ValidationError(formatZodIssues(result.error), req.params.ticker);
  }
  return result.data.ticker;
}

/**
 * Wrap a ticker operation: anything it throws that is not already an
 * AppError becomes an UpstreamRetrievalError for that ticker
 */
function tickerHandler(
  operation: (ticker: string, req: Request) => Promise<object>
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    let ticker = req.params.ticker ?? '';
    try {
      ticker = parseTicker(req);
      res.json(await operation(ticker, req));
    } catch (error) {
      next(error instanceof AppError ? error : UpstreamRetrievalError.from(ticker, error));
    }
  };
}

export function createQuotesController(quoteService: QuoteService): QuotesController {
  return {
    /**
     * GET /api/fundamentals/:ticker
     */
    getFundamentals: tickerHandler((ticker) => quoteService.getFundamentals(ticker)),

    /**
     * GET /api/historical/:ticker?period=1y&interval=1d
     */
    getHistorical: tickerHandler((ticker, req) => {
      const query = historicalQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError(formatZodIssues(query.error), ticker);
      }
      return quoteService.getHistorical(ticker, query.data.period, query.data.interval);
    }),

    /**
     * GET /api/quote/:ticker
     */
    getQuote: tickerHandler((ticker) => quoteService.getQuote(ticker)),
  };
}
