import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { SERVICE_INFO } from '@/constants/service';
import { QuoteService } from '@/services/quote.service';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import { getMetrics } from '@/api/controllers/metrics.controller';
import { createApiRouter } from '@/api/routes';

/**
 * Everything a request handler may use. Created once at startup and shared
 * read-only by all requests.
 */
export interface AppDependencies {
  quoteService: QuoteService;
}

function loadOpenApiDocument(): Record<string, unknown> | null {
  try {
    const openapiPath = join(__dirname, '../docs/openapi.yaml');
    const document = yaml.load(readFileSync(openapiPath, 'utf8'));
    if (document !== null && typeof document === 'object' && !Array.isArray(document)) {
      return { ...document };
    }
    logger.warn({ openapiPath }, 'OpenAPI document is not a mapping');
  } catch (error) {
    logger.warn({ error }, 'Could not load OpenAPI documentation');
  }
  return null;
}

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */
export function createApp({ quoteService }: AppDependencies): Application {
  const app = express();

  // ============================================
  // Middleware Configuration
  // ============================================

  app.set('trust proxy', true);

  // Security headers
  app.use(helmet());

  // CORS - open outside production, without credentials
  app.use(
    cors({
      origin: env.NODE_ENV === 'production' ? false : '*',
      credentials: false,
    })
  );

  // HTTP metrics tracking (skips /health and /metrics)
  app.use(metricsMiddleware);

  // Request logging (pino-http)
  app.use(requestLogger);

  // ============================================
  // Routes
  // ============================================

  const openapiDocument = loadOpenApiDocument();
  if (openapiDocument) {
    app.use(SERVICE_INFO.DOCS_PATH, swaggerUi.serve, swaggerUi.setup(openapiDocument));
  }

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: SERVICE_INFO.NAME,
      version: SERVICE_INFO.VERSION,
      description: SERVICE_INFO.DESCRIPTION,
      status: 'running',
      documentation: SERVICE_INFO.DOCS_PATH,
      endpoints: {
        health: '/health',
        fundamentals: '/api/fundamentals/:ticker',
        historical: '/api/historical/:ticker?period=1y&interval=1d',
        quote: '/api/quote/:ticker',
        metrics: '/metrics',
      },
      timestamp: new Date().toISOString(),
    });
  });

  // Liveness
  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  // Prometheus-format metrics
  app.get('/metrics', getMetrics);

  // API routes (mounted at /api)
  app.use('/api', createApiRouter(quoteService));

  // ============================================
  // Error Handlers
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
