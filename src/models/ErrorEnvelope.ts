/**
 * Body of every failed response. Never carries data fields.
 */
export interface ErrorEnvelope {
  ticker?: string;
  success: false;
  error: string;
}
