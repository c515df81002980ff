import { PriceBar, TickerInfo } from '@/models';

/**
 * Market Data Provider Interface
 * The only two upstream operations the gateway needs. Implementations are
 * created once at startup and shared read-only between requests.
 */
export interface IMarketDataProvider {
  /**
   * Fetch descriptive/statistical info for a ticker
   * @returns Flat record keyed by upstream field names
   */
  getTickerInfo(ticker: string): Promise<TickerInfo>;

  /**
   * Fetch a price series for a ticker
   * Period/interval tokens are interpreted (and rejected) by the provider.
   * @returns Bars in ascending date order, possibly empty
   */
  getPriceHistory(ticker: string, period: string, interval: string): Promise<PriceBar[]>;
}
