import { z } from 'zod';
import {
  FundamentalsRecord,
  HistoricalRecord,
  OhlcvPoint,
  PriceBar,
  QuotePoint,
  TickerInfo,
} from '@/models';
import { IMarketDataProvider } from '@/providers/interfaces';
import { PERCENTAGE_FIELDS, QUOTE_SERIES, ROUNDING } from '@/constants/market';
import { ILogger } from '@/interfaces/ILogger';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { roundTo, toIsoDate } from '@/utils/format';
import { formatZodIssues } from '@/validators/quote.validator';

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? null);

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

/**
 * Upstream fields read for fundamentals. Anything else in TickerInfo is
 * ignored; a listed field of the wrong type is malformed upstream data.
 */
const tickerInfoSchema = z.object({
  longName: optionalString,
  trailingPE: optionalNumber,
  priceToBook: optionalNumber,
  priceToSalesTrailing12Months: optionalNumber,
  pegRatio: optionalNumber,
  returnOnEquity: optionalNumber,
  returnOnAssets: optionalNumber,
  profitMargins: optionalNumber,
  dividendYield: optionalNumber,
  dividendRate: optionalNumber,
  payoutRatio: optionalNumber,
  revenueGrowth: optionalNumber,
  earningsGrowth: optionalNumber,
  debtToEquity: optionalNumber,
  currentRatio: optionalNumber,
  beta: optionalNumber,
  recommendationKey: optionalString,
});

type ParsedTickerInfo = z.infer<typeof tickerInfoSchema>;

function parseTickerInfo(ticker: string, info: TickerInfo): ParsedTickerInfo {
  const result = tickerInfoSchema.safeParse(info);
  if (!result.success) {
    throw new Error(`Malformed upstream data for ${ticker}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

const TRADING_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Price bar → output point: prices rounded, volume truncated,
 * adjusted_close copied from the rounded close (upstream series is
 * already adjusted)
 */
export function toOhlcvPoint(bar: PriceBar): OhlcvPoint {
  const { open, high, low, close, volume } = bar;
  if (![open, high, low, close, volume].every(Number.isFinite) || !TRADING_DATE.test(bar.date)) {
    throw new Error('Malformed price bar in upstream series');
  }

  const roundedClose = roundTo(close, ROUNDING.PRICE);

  return {
    date: bar.date,
    open: roundTo(open, ROUNDING.PRICE),
    high: roundTo(high, ROUNDING.PRICE),
    low: roundTo(low, ROUNDING.PRICE),
    close: roundedClose,
    volume: Math.trunc(volume),
    adjusted_close: roundedClose,
  };
}

/**
 * Quote Service
 * Calls the upstream provider and reshapes its data into the gateway's
 * response records. Errors propagate to the caller untouched.
 */
export class QuoteService {
  private readonly logger: ILogger;

  constructor(
    private readonly marketData: IMarketDataProvider,
    private readonly now: () => Date = () => new Date(),
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('QuoteService');
  }

  /**
   * Fundamentals snapshot for a ticker
   *
   * Percentage fields are converted from upstream fractions (0.153 → 15.3);
   * every other ratio passes through unrounded.
   */
  async getFundamentals(ticker: string): Promise<FundamentalsRecord> {
    this.logger.info({ ticker }, `Fetching fundamentals for ${ticker}`);

    const info = parseTickerInfo(ticker, await this.marketData.getTickerInfo(ticker));

    const fundamentals: FundamentalsRecord = {
      ticker,
      name: info.longName ?? '',
      date: toIsoDate(this.now()),

      // Valuation ratios
      pe_ratio: info.trailingPE,
      pb_ratio: info.priceToBook,
      ps_ratio: info.priceToSalesTrailing12Months,
      peg_ratio: info.pegRatio,

      // Profitability
      roe: info.returnOnEquity,
      roa: info.returnOnAssets,
      profit_margin: info.profitMargins,

      // Dividends
      dividend_yield: info.dividendYield,
      dividend_per_share: info.dividendRate,
      payout_ratio: info.payoutRatio,

      // Growth
      revenue_growth: info.revenueGrowth,
      earnings_growth: info.earningsGrowth,

      // Debt
      debt_to_equity: info.debtToEquity,
      current_ratio: info.currentRatio,

      beta: info.beta,
      analyst_rating: info.recommendationKey,

      success: true,
    };

    for (const field of PERCENTAGE_FIELDS) {
      const fraction = fundamentals[field];
      if (fraction !== null) {
        fundamentals[field] = roundTo(fraction * 100, ROUNDING.PERCENT);
      }
    }

    this.logger.info({ ticker }, `Successfully fetched fundamentals for ${ticker}`);
    return fundamentals;
  }

  /**
   * Price series over a period/interval, in upstream order
   * An empty series is a valid (empty) result.
   */
  async getHistorical(ticker: string, period: string, interval: string): Promise<HistoricalRecord> {
    this.logger.info(
      { ticker, period, interval },
      `Fetching historical data for ${ticker} (period=${period}, interval=${interval})`
    );

    const bars = await this.marketData.getPriceHistory(ticker, period, interval);
    const data = bars.map(toOhlcvPoint);

    this.logger.info(
      { ticker, points: data.length },
      `Successfully fetched ${data.length} historical data points for ${ticker}`
    );

    return {
      ticker,
      period,
      interval,
      data,
      success: true,
    };
  }

  /**
   * Latest trading day, dated by the bar itself rather than the request
   */
  async getQuote(ticker: string): Promise<QuotePoint> {
    this.logger.info({ ticker }, `Fetching quote for ${ticker}`);

    const bars = await this.marketData.getPriceHistory(
      ticker,
      QUOTE_SERIES.PERIOD,
      QUOTE_SERIES.INTERVAL
    );

    const latest = bars.at(-1);
    if (!latest) {
      throw new Error(`No data available for ${ticker}`);
    }

    const quote: QuotePoint = {
      ticker,
      ...toOhlcvPoint(latest),
      success: true,
    };

    this.logger.info({ ticker, date: quote.date }, `Successfully fetched quote for ${ticker}`);
    return quote;
  }
}
