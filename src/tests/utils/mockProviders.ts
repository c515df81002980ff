/**
 * Mock Provider Factories
 * Helper functions to create mocked upstream providers and fixtures for testing
 */

import { IMarketDataProvider } from '@/providers/interfaces';
import { PriceBar } from '@/models';
import { YahooFinanceClient } from '@/providers/yahooFinance.provider';

/**
 * Create a fully mocked IMarketDataProvider
 * All methods are jest.fn() and can be configured with .mockResolvedValue()
 */
export function createMockMarketDataProvider(): jest.Mocked<IMarketDataProvider> {
  return {
    getTickerInfo: jest.fn(),
    getPriceHistory: jest.fn(),
  };
}

/**
 * Create a mocked slice of the yahoo-finance2 module
 */
export function createMockYahooClient(): jest.Mocked<YahooFinanceClient> {
  return {
    quoteSummary: jest.fn(),
    chart: jest.fn(),
  };
}

/**
 * Fixed clock: Friday 2024-03-15, midday UTC
 */
export const FIXED_NOW = new Date('2024-03-15T12:00:00.000Z');
export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

/**
 * Daily bar fixture, dated by its trading day (YYYY-MM-DD)
 */
export function priceBar(date: string, close: number, overrides: Partial<PriceBar> = {}): PriceBar {
  return {
    date,
    open: close - 1,
    high: close + 2,
    low: close - 2,
    close,
    volume: 1_000,
    ...overrides,
  };
}
