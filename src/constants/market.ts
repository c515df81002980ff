/**
 * Query defaults for GET /api/historical/:ticker
 */
export const HISTORY_DEFAULTS = {
  PERIOD: '1y',
  INTERVAL: '1d',
} as const;

/**
 * Series requested for GET /api/quote/:ticker (latest trading day)
 */
export const QUOTE_SERIES = {
  PERIOD: '1d',
  INTERVAL: '1d',
} as const;

/**
 * Upstream fields reported in percent (upstream gives fractions)
 */
export const PERCENTAGE_FIELDS = [
  'roe',
  'roa',
  'profit_margin',
  'dividend_yield',
  'revenue_growth',
  'earnings_growth',
] as const;

/**
 * Decimal places applied to output values
 */
export const ROUNDING = {
  PERCENT: 2,
  PRICE: 4,
} as const;

/**
 * Chart intervals understood by Yahoo Finance
 */
export const CHART_INTERVALS = [
  '1m',
  '2m',
  '5m',
  '15m',
  '30m',
  '60m',
  '90m',
  '1h',
  '1d',
  '5d',
  '1wk',
  '1mo',
  '3mo',
] as const;

/**
 * Period tokens understood by the Yahoo provider
 */
export const CHART_PERIODS = [
  '1d',
  '5d',
  '1mo',
  '3mo',
  '6mo',
  '1y',
  '2y',
  '5y',
  '10y',
  'ytd',
  'max',
] as const;

// Type exports
export type ChartInterval = (typeof CHART_INTERVALS)[number];
export type ChartPeriod = (typeof CHART_PERIODS)[number];
export type PercentageField = (typeof PERCENTAGE_FIELDS)[number];
