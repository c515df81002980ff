/**
 * Fundamentals for one ticker
 *
 * Every ratio is independently nullable: the upstream source omits fields per
 * ticker and an omitted field is reported as null, never 0.
 * Percentage fields (roe, roa, profit_margin, dividend_yield, revenue_growth,
 * earnings_growth) are expressed in percent, rounded to 2 decimals.
 */
export interface FundamentalsRecord {
  ticker: string;
  name: string;
  /** Generation date (YYYY-MM-DD), not an as-of date of the data */
  date: string;

  // Valuation
  pe_ratio: number | null;
  pb_ratio: number | null;
  ps_ratio: number | null;
  peg_ratio: number | null;

  // Profitability
  roe: number | null;
  roa: number | null;
  profit_margin: number | null;

  // Dividends
  dividend_yield: number | null;
  dividend_per_share: number | null;
  payout_ratio: number | null;

  // Growth
  revenue_growth: number | null;
  earnings_growth: number | null;

  // Debt
  debt_to_equity: number | null;
  current_ratio: number | null;

  beta: number | null;
  analyst_rating: string | null;

  success: true;
}
