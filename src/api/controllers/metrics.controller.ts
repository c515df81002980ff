/**
 * Metrics Controller
 *
 * Exposes HTTP and process metrics in Prometheus text format.
 */

import { Request, Response } from 'express';
import { getHttpMetrics } from '@/api/middlewares/metricsMiddleware';
import { SERVICE_INFO } from '@/constants/service';
import { env } from '@/config/env';

function gauge(metrics: string[], name: string, help: string, value: number): void {
  metrics.push(`# HELP ${name} ${help}`);
  metrics.push(`# TYPE ${name} gauge`);
  metrics.push(`${name} ${value}`);
  metrics.push('');
}

/**
 * GET /metrics
 *
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */
export function getMetrics(_req: Request, res: Response): void {
  const metrics: string[] = [...getHttpMetrics()];

  gauge(metrics, 'process_uptime_seconds', 'Process uptime in seconds', process.uptime());

  const memUsage = process.memoryUsage();
  gauge(metrics, 'process_heap_used_bytes', 'Process heap memory used in bytes', memUsage.heapUsed);
  gauge(metrics, 'process_heap_total_bytes', 'Process heap memory total in bytes', memUsage.heapTotal);
  gauge(metrics, 'process_rss_bytes', 'Process resident set size in bytes', memUsage.rss);

  const cpuUsage = process.cpuUsage();
  metrics.push('# HELP process_cpu_user_seconds_total Total user CPU time in seconds');
  metrics.push('# TYPE process_cpu_user_seconds_total counter');
  metrics.push(`process_cpu_user_seconds_total ${cpuUsage.user / 1_000_000}`);
  metrics.push('');

  metrics.push('# HELP process_cpu_system_seconds_total Total system CPU time in seconds');
  metrics.push('# TYPE process_cpu_system_seconds_total counter');
  metrics.push(`process_cpu_system_seconds_total ${cpuUsage.system / 1_000_000}`);
  metrics.push('');

  metrics.push('# HELP app_info Application information');
  metrics.push('# TYPE app_info gauge');
  metrics.push(
    `app_info{version="${SERVICE_INFO.VERSION}",node_version="${process.version}",env="${env.NODE_ENV}"} 1`
  );
  metrics.push('');

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(metrics.join('\n'));
}
