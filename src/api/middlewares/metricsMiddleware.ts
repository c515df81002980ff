/**
 * HTTP Metrics Middleware
 *
 * Tracks per-route request counts and latency in memory:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path}
 */

import { Request, Response, NextFunction } from 'express';
import { SERVICE_INFO } from '@/constants/service';

/** Latency samples kept per route */
const MAX_DURATION_SAMPLES = 1000;

/** Paths that are never counted */
const UNTRACKED_PATHS = new Set(['/metrics', '/health']);

/** Routes reported under their own path */
const STATIC_ROUTES = new Set(['/', '/metrics', '/health']);

/** Label for every path outside the route table (404s, scanners) */
export const UNMATCHED_PATH = 'unmatched';

interface RequestCount {
  method: string;
  path: string;
  status: number;
  count: number;
}

interface RouteDurations {
  method: string;
  path: string;
  samples: number[];
}

const requestCounts = new Map<string, RequestCount>();
const requestDurations = new Map<string, RouteDurations>();

/**
 * Map a request path onto the bounded set of route labels
 * /api/quote/MC.PA -> /api/quote/:ticker, /docs/swagger-ui.css -> /docs,
 * anything unknown -> unmatched
 */
export function normalizePath(path: string): string {
  const tickerRoute = /^\/api\/(fundamentals|historical|quote)\/[^/]+\/?$/.exec(path);
  if (tickerRoute) {
    return `/api/${tickerRoute[1] ?? ''}/:ticker`;
  }
  if (STATIC_ROUTES.has(path)) {
    return path;
  }
  if (path === SERVICE_INFO.DOCS_PATH || path.startsWith(`${SERVICE_INFO.DOCS_PATH}/`)) {
    return SERVICE_INFO.DOCS_PATH;
  }
  return UNMATCHED_PATH;
}

/**
 * Escape a Prometheus label value
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function routeLabels(method: string, path: string): string {
  return `method="${escapeLabelValue(method)}",path="${escapeLabelValue(path)}"`;
}

/**
 * Middleware to track HTTP request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const path = normalizePath(req.path);

  if (UNTRACKED_PATHS.has(path)) {
    next();
    return;
  }

  const startTime = process.hrtime.bigint();

  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
    const method = req.method;
    const status = res.statusCode;

    const countKey = `${method} ${path} ${status}`;
    const counter = requestCounts.get(countKey) ?? { method, path, status, count: 0 };
    counter.count += 1;
    requestCounts.set(countKey, counter);

    const durationKey = `${method} ${path}`;
    const route = requestDurations.get(durationKey) ?? { method, path, samples: [] };
    route.samples.push(duration);
    if (route.samples.length > MAX_DURATION_SAMPLES) {
      route.samples.shift();
    }
    requestDurations.set(durationKey, route);
  });

  next();
}

function quantile(sorted: number[], q: number): number {
  return sorted[Math.floor(sorted.length * q)] ?? sorted[sorted.length - 1] ?? 0;
}

/**
 * Get all HTTP request metrics in Prometheus format
 */
export function getHttpMetrics(): string[] {
  const metrics: string[] = [];

  // ============================================
  // HTTP Requests Total (Counter)
  // ============================================
  metrics.push('# HELP http_requests_total Total HTTP requests');
  metrics.push('# TYPE http_requests_total counter');

  for (const { method, path, status, count } of requestCounts.values()) {
    metrics.push(`http_requests_total{${routeLabels(method, path)},status="${status}"} ${count}`);
  }
  metrics.push('');

  // ============================================
  // HTTP Request Duration (Summary)
  // ============================================
  metrics.push('# HELP http_request_duration_seconds HTTP request duration in seconds');
  metrics.push('# TYPE http_request_duration_seconds summary');

  for (const { method, path, samples } of requestDurations.values()) {
    if (samples.length === 0) continue;

    const labels = routeLabels(method, path);
    const sum = samples.reduce((a, b) => a + b, 0);
    const sorted = [...samples].sort((a, b) => a - b);

    metrics.push(`http_request_duration_seconds{${labels},quantile="0.5"} ${quantile(sorted, 0.5).toFixed(4)}`);
    metrics.push(`http_request_duration_seconds{${labels},quantile="0.95"} ${quantile(sorted, 0.95).toFixed(4)}`);
    metrics.push(`http_request_duration_seconds{${labels},quantile="0.99"} ${quantile(sorted, 0.99).toFixed(4)}`);
    metrics.push(`http_request_duration_seconds_sum{${labels}} ${sum.toFixed(4)}`);
    metrics.push(`http_request_duration_seconds_count{${labels}} ${samples.length}`);
  }
  metrics.push('');

  return metrics;
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  requestCounts.clear();
  requestDurations.clear();
}
