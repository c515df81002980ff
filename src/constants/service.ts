/**
 * Identity reported by GET / and GET /metrics
 */
export const SERVICE_INFO = {
  NAME: 'Yahoo Finance API',
  VERSION: '1.0.0',
  DESCRIPTION: 'Stock fundamentals, quotes and price history for workflow automation',
  DOCS_PATH: '/docs',
} as const;
