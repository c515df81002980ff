/**
 * Upstream-side shapes returned by an IMarketDataProvider
 */

/**
 * Descriptive/statistical info for a ticker, keyed by the upstream field
 * names (trailingPE, returnOnEquity, recommendationKey, ...).
 * Any key may be missing for a given ticker.
 */
export type TickerInfo = Record<string, unknown>;

/**
 * One bar of an upstream price series. Prices are already dividend/split
 * adjusted by the provider.
 */
export interface PriceBar {
  /** Trading date (YYYY-MM-DD) in the exchange's own time zone */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}
