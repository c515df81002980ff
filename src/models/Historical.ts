/**
 * One trading period of a price series
 * Prices rounded to 4 decimals; adjusted_close always equals close.
 */
export interface OhlcvPoint {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  adjusted_close: number;
}

export interface HistoricalRecord {
  ticker: string;
  period: string;
  interval: string;
  /** Upstream chronological order, never re-sorted */
  data: OhlcvPoint[];
  success: true;
}

/**
 * Latest trading day for a ticker
 */
export interface QuotePoint extends OhlcvPoint {
  ticker: string;
  success: true;
}
