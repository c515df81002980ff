/**
 * Dependency Container
 * Instantiates and wires the upstream provider and the service
 *
 * Only the server entry point imports this module; tests build their own
 * QuoteService around a fake provider.
 */

import yahooFinance from 'yahoo-finance2';
import { env } from '@/config/env';
import { YahooFinanceProvider } from '@/providers/yahooFinance.provider';
import { QuoteService } from '@/services/quote.service';
import { AppDependencies } from '@/app';

// ============================================================================
// PROVIDERS
// ============================================================================

/**
 * Yahoo Finance, presenting a desktop browser signature
 */
export const marketDataProvider = new YahooFinanceProvider(yahooFinance, env.UPSTREAM_USER_AGENT);

// ============================================================================
// SERVICES
// ============================================================================

export const quoteService = new QuoteService(marketDataProvider);

export const dependencies: AppDependencies = {
  quoteService,
};
