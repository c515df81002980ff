import { PriceBar, TickerInfo } from '@/models';
import {
  CHART_INTERVALS,
  CHART_PERIODS,
  ChartInterval,
  ChartPeriod,
} from '@/constants/market';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { createDateFormatter } from '@/utils/format';
import { IMarketDataProvider } from './interfaces/IMarketDataProvider';

const logger = createLogger('YahooFinanceProvider');

/**
 * Quote-summary modules merged into one TickerInfo record
 * Later modules win on duplicate keys (beta appears in two of them).
 */
const QUOTE_SUMMARY_MODULES = [
  'defaultKeyStatistics',
  'financialData',
  'summaryDetail',
  'price',
] as const;

type QuoteSummaryModule = (typeof QUOTE_SUMMARY_MODULES)[number];

/**
 * Periods counted in trading sessions rather than calendar time
 */
const SESSION_PERIODS: Partial<Record<ChartPeriod, number>> = {
  '1d': 1,
  '5d': 5,
};

/**
 * Extra calendar days fetched for session periods, covering weekends and
 * market holidays
 */
const SESSION_PADDING_DAYS = 7;

const MONTH_PERIODS: Partial<Record<ChartPeriod, number>> = {
  '1mo': 1,
  '3mo': 3,
  '6mo': 6,
  '1y': 12,
  '2y': 24,
  '5y': 60,
  '10y': 120,
};

export interface YahooRequestOptions {
  fetchOptions: {
    headers: Record<string, string>;
  };
}

export type QuoteSummaryPayload = Partial<Record<QuoteSummaryModule, object>>;

export interface ChartQuote {
  date: Date;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  /** Close adjusted for dividends and splits */
  adjclose?: number | null;
  volume: number | null;
}

export interface ChartResult {
  meta: {
    /** IANA zone of the listing exchange, e.g. America/New_York */
    exchangeTimezoneName: string;
  };
  quotes: ChartQuote[];
}

/**
 * The slice of the yahoo-finance2 module this provider calls
 */
export interface YahooFinanceClient {
  quoteSummary(
    symbol: string,
    queryOptions: { modules: QuoteSummaryModule[] },
    moduleOptions: YahooRequestOptions
  ): Promise<QuoteSummaryPayload>;

  chart(
    symbol: string,
    queryOptions: { period1: Date; interval: ChartInterval },
    moduleOptions: YahooRequestOptions
  ): Promise<ChartResult>;
}

type CompleteQuote = ChartQuote & {
  open: number;
  high: number;
  low: number;
  close: number;
};

function isCompleteQuote(quote: ChartQuote): quote is CompleteQuote {
  return (
    quote.open !== null && quote.high !== null && quote.low !== null && quote.close !== null
  );
}

/**
 * Chart rows carry raw (split-adjusted) OHLC plus a separately adjusted
 * close. The whole bar is scaled by adjclose / close so every price is
 * dividend adjusted.
 */
function toPriceBar(quote: CompleteQuote, tradingDate: (date: Date) => string): PriceBar {
  const close = quote.adjclose ?? quote.close;
  const factor = quote.close === 0 ? 1 : close / quote.close;

  return {
    date: tradingDate(quote.date),
    open: quote.open * factor,
    high: quote.high * factor,
    low: quote.low * factor,
    close,
    volume: quote.volume ?? 0,
  };
}

function parsePeriod(period: string): ChartPeriod {
  const match = CHART_PERIODS.find((candidate) => candidate === period);
  if (!match) {
    throw new Error(`Period '${period}' is invalid, must be one of ${CHART_PERIODS.join(', ')}`);
  }
  return match;
}

function parseInterval(interval: string): ChartInterval {
  const match = CHART_INTERVALS.find((candidate) => candidate === interval);
  if (!match) {
    throw new Error(
      `Interval '${interval}' is invalid, must be one of ${CHART_INTERVALS.join(', ')}`
    );
  }
  return match;
}

/**
 * First instant requested from the chart endpoint for a period
 */
export function periodStart(period: ChartPeriod, now: Date): Date {
  if (period === 'max') {
    return new Date(0);
  }
  if (period === 'ytd') {
    return new Date(Date.UTC(now.getUTCFullYear(), 0, 1));
  }

  const start = new Date(now.getTime());
  const sessions = SESSION_PERIODS[period];
  if (sessions !== undefined) {
    start.setUTCDate(start.getUTCDate() - sessions - SESSION_PADDING_DAYS);
    return start;
  }

  // Same day of month, clamped to the target month's length (Mar 31 - 1mo = Feb 29)
  const months = MONTH_PERIODS[period] ?? 0;
  const day = start.getUTCDate();
  start.setUTCDate(1);
  start.setUTCMonth(start.getUTCMonth() - months);
  const monthLength = new Date(
    Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 0)
  ).getUTCDate();
  start.setUTCDate(Math.min(day, monthLength));
  return start;
}

/**
 * Keep the bars of the last `sessions` distinct trading days
 */
export function keepLastSessions(bars: PriceBar[], sessions: number): PriceBar[] {
  const days = [...new Set(bars.map((bar) => bar.date))];
  const kept = new Set(days.slice(-sessions));
  return bars.filter((bar) => kept.has(bar.date));
}

/**
 * Yahoo Finance Provider
 * IMarketDataProvider over yahoo-finance2. Every upstream call presents the
 * configured browser User-Agent.
 */
export class YahooFinanceProvider implements IMarketDataProvider {
  private readonly requestOptions: YahooRequestOptions;

  constructor(
    private readonly client: YahooFinanceClient,
    userAgent: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.requestOptions = {
      fetchOptions: {
        headers: { 'User-Agent': userAgent },
      },
    };
  }

  async getTickerInfo(ticker: string): Promise<TickerInfo> {
    const summary = await this.client.quoteSummary(
      ticker,
      { modules: [...QUOTE_SUMMARY_MODULES] },
      this.requestOptions
    );

    const { defaultKeyStatistics, financialData, summaryDetail, price } = summary;
    if (!defaultKeyStatistics && !financialData && !summaryDetail && !price) {
      throw new Error(`No fundamentals data found for ${ticker}`);
    }

    return { ...defaultKeyStatistics, ...financialData, ...summaryDetail, ...price };
  }

  async getPriceHistory(ticker: string, period: string, interval: string): Promise<PriceBar[]> {
    const chartPeriod = parsePeriod(period);
    const chartInterval = parseInterval(interval);
    const period1 = periodStart(chartPeriod, this.now());

    logger.debug(
      { ticker, period: chartPeriod, interval: chartInterval, period1: period1.toISOString() },
      'Requesting chart'
    );

    const { meta, quotes } = await this.client.chart(
      ticker,
      { period1, interval: chartInterval },
      this.requestOptions
    );

    const tradingDate = createDateFormatter(meta.exchangeTimezoneName);
    const bars = quotes.filter(isCompleteQuote).map((quote) => toPriceBar(quote, tradingDate));
    const sessions = SESSION_PERIODS[chartPeriod];

    return sessions === undefined ? bars : keepLastSessions(bars, sessions);
  }
}
