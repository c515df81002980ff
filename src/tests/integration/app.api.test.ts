import request from 'supertest';
import { Application } from 'express';
import { createApp } from '@/app';
import { QuoteService } from '@/services/quote.service';
import { resetMetrics } from '@/api/middlewares/metricsMiddleware';
import {
  createMockMarketDataProvider,
  fixedClock,
  priceBar,
} from '@/tests/utils/mockProviders';

describe('Service endpoints', () => {
  let app: Application;
  const mockProvider = createMockMarketDataProvider();

  beforeEach(() => {
    resetMetrics();
    app = createApp({ quoteService: new QuoteService(mockProvider, fixedClock) });
  });

  describe('GET /', () => {
    it('should return service metadata and a timestamp', async () => {
      const response = await request(app).get('/').expect(200);

      expect(response.body.name).toBe('Yahoo Finance API');
      expect(response.body.version).toBe('1.0.0');
      expect(response.body.status).toBe('running');
      expect(response.body.endpoints.quote).toBe('/api/quote/:ticker');
      expect(Number.isNaN(Date.parse(response.body.timestamp))).toBe(false);
    });
  });

  describe('GET /health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body.status).toBe('healthy');
      expect(Number.isNaN(Date.parse(response.body.timestamp))).toBe(false);
    });
  });

  describe('GET /metrics', () => {
    it('should count requests per normalized route', async () => {
      mockProvider.getPriceHistory.mockResolvedValue([priceBar('2024-03-14', 10)]);

      await request(app).get('/api/quote/MC.PA').expect(200);
      await request(app).get('/api/quote/AAPL').expect(200);
      await request(app).get('/health').expect(200);

      const response = await request(app).get('/metrics').expect(200);

      expect(response.headers['content-type']).toContain('text/plain');
      const lines = response.text.split('\n');
      expect(lines).toContain(
        'http_requests_total{method="GET",path="/api/quote/:ticker",status="200"} 2'
      );
      expect(lines).toContain(
        'http_request_duration_seconds_count{method="GET",path="/api/quote/:ticker"} 2'
      );
      expect(lines.some((line) => line.includes('path="/health"'))).toBe(false);
    });
  });

  describe('GET /docs/', () => {
    it('should serve the Swagger UI', async () => {
      const response = await request(app).get('/docs/').expect(200);

      expect(response.text).toContain('Swagger UI');
    });
  });
});
