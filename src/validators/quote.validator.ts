import { z, ZodError } from 'zod';
import { HISTORY_DEFAULTS } from '@/constants/market';

/**
 * Path parameters shared by every ticker route
 *
 * The ticker itself is free-form: unknown symbols are only detected by the
 * upstream source.
 */
export const tickerParamsSchema = z.object({
  ticker: z.string().trim().min(1, 'Ticker is required'),
});

/**
 * Query string of GET /api/historical/:ticker
 *
 * Tokens are not whitelisted here; the upstream provider decides what a
 * valid period or interval is. A repeated parameter arrives as an array and
 * fails the string check.
 */
export const historicalQuerySchema = z.object({
  period: z.string().trim().min(1, 'period must not be empty').default(HISTORY_DEFAULTS.PERIOD),
  interval: z
    .string()
    .trim()
    .min(1, 'interval must not be empty')
    .default(HISTORY_DEFAULTS.INTERVAL),
});

export type TickerParams = z.infer<typeof tickerParamsSchema>;
export type HistoricalQuery = z.infer<typeof historicalQuerySchema>;

/**
 * One-line summary of a validation failure, e.g. "period: Expected string, received array"
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
