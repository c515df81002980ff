import request from 'supertest';
import { Application } from 'express';
import { createApp } from '@/app';
import { QuoteService } from '@/services/quote.service';
import { IMarketDataProvider } from '@/providers/interfaces';
import {
  createMockMarketDataProvider,
  fixedClock,
  priceBar,
} from '@/tests/utils/mockProviders';

const DATA_FIELDS = ['date', 'open', 'high', 'low', 'close', 'volume', 'adjusted_close', 'data'];

describe('Quotes API', () => {
  let app: Application;
  let mockProvider: jest.Mocked<IMarketDataProvider>;

  beforeEach(() => {
    mockProvider = createMockMarketDataProvider();
    app = createApp({ quoteService: new QuoteService(mockProvider, fixedClock) });
  });

  describe('GET /api/fundamentals/:ticker', () => {
    it('should return fundamentals with percentage fields converted', async () => {
      mockProvider.getTickerInfo.mockResolvedValue({
        longName: 'Example Luxury Group',
        trailingPE: 24.5,
        returnOnEquity: 0.153,
        dividendYield: 0.0185,
        recommendationKey: 'buy',
      });

      const response = await request(app).get('/api/fundamentals/MC.PA').expect(200);

      expect(response.body.ticker).toBe('MC.PA');
      expect(response.body.name).toBe('Example Luxury Group');
      expect(response.body.date).toBe('2024-03-15');
      expect(response.body.pe_ratio).toBe(24.5);
      expect(response.body.roe).toBe(15.3);
      expect(response.body.dividend_yield).toBe(1.85);
      expect(response.body.peg_ratio).toBeNull();
      expect(response.body.analyst_rating).toBe('buy');
      expect(response.body.success).toBe(true);
      expect(response.body).not.toHaveProperty('error');
    });

    it('should return the error envelope with 500 on upstream failure', async () => {
      mockProvider.getTickerInfo.mockRejectedValue(
        new Error('Quote not found for ticker symbol: NOPE')
      );

      const response = await request(app).get('/api/fundamentals/NOPE').expect(500);

      expect(response.body).toEqual({
        ticker: 'NOPE',
        success: false,
        error: 'Quote not found for ticker symbol: NOPE',
      });
    });

    it('should return 500 for malformed upstream data', async () => {
      mockProvider.getTickerInfo.mockResolvedValue({ beta: 'high' });

      const response = await request(app).get('/api/fundamentals/MC.PA').expect(500);

      expect(response.body).toEqual({
        ticker: 'MC.PA',
        success: false,
        error: 'Malformed upstream data for MC.PA: beta: Expected number, received string',
      });
    });

    it('should reject a blank ticker with 400', async () => {
      const response = await request(app).get('/api/fundamentals/%20%20').expect(400);

      expect(response.body).toEqual({
        ticker: '  ',
        success: false,
        error: 'ticker: Ticker is required',
      });
      expect(mockProvider.getTickerInfo).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/historical/:ticker', () => {
    it('should default period to 1y and interval to 1d', async () => {
      mockProvider.getPriceHistory.mockResolvedValue([
        priceBar('2024-03-13', 100),
        priceBar('2024-03-14', 101.123456),
      ]);

      const response = await request(app).get('/api/historical/MC.PA').expect(200);

      expect(mockProvider.getPriceHistory).toHaveBeenCalledWith('MC.PA', '1y', '1d');
      expect(response.body.ticker).toBe('MC.PA');
      expect(response.body.period).toBe('1y');
      expect(response.body.interval).toBe('1d');
      expect(response.body.success).toBe(true);
      expect(response.body.data).toEqual([
        {
          date: '2024-03-13',
          open: 99,
          high: 102,
          low: 98,
          close: 100,
          volume: 1000,
          adjusted_close: 100,
        },
        {
          date: '2024-03-14',
          open: 100.1235,
          high: 103.1235,
          low: 99.1235,
          close: 101.1235,
          volume: 1000,
          adjusted_close: 101.1235,
        },
      ]);
    });

    it('should forward period and interval untouched', async () => {
      mockProvider.getPriceHistory.mockResolvedValue([]);

      const response = await request(app)
        .get('/api/historical/AAPL')
        .query({ period: '5d', interval: '1wk' })
        .expect(200);

      expect(mockProvider.getPriceHistory).toHaveBeenCalledWith('AAPL', '5d', '1wk');
      expect(response.body.period).toBe('5d');
      expect(response.body.interval).toBe('1wk');
    });

    it('should return an empty series with 200 when upstream has no rows', async () => {
      mockProvider.getPriceHistory.mockResolvedValue([]);

      const response = await request(app)
        .get('/api/historical/MC.PA')
        .query({ period: '1d', interval: '1m' })
        .expect(200);

      expect(response.body).toEqual({
        ticker: 'MC.PA',
        period: '1d',
        interval: '1m',
        data: [],
        success: true,
      });
    });

    it('should surface provider token errors as 500', async () => {
      mockProvider.getPriceHistory.mockRejectedValue(new Error("Interval '7m' is invalid"));

      const response = await request(app)
        .get('/api/historical/MC.PA')
        .query({ interval: '7m' })
        .expect(500);

      expect(response.body).toEqual({
        ticker: 'MC.PA',
        success: false,
        error: "Interval '7m' is invalid",
      });
    });

    it('should reject a repeated query parameter with 400', async () => {
      const response = await request(app)
        .get('/api/historical/MC.PA?period=1y&period=5y')
        .expect(400);

      expect(response.body).toEqual({
        ticker: 'MC.PA',
        success: false,
        error: 'period: Expected string, received array',
      });
      expect(mockProvider.getPriceHistory).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/quote/:ticker', () => {
    it('should return the latest trading day', async () => {
      mockProvider.getPriceHistory.mockResolvedValue([
        priceBar('2024-03-14', 712.5, { volume: 250000 }),
      ]);

      const response = await request(app).get('/api/quote/MC.PA').expect(200);

      expect(response.body).toEqual({
        ticker: 'MC.PA',
        date: '2024-03-14',
        open: 711.5,
        high: 714.5,
        low: 710.5,
        close: 712.5,
        volume: 250000,
        adjusted_close: 712.5,
        success: true,
      });
    });

    it('should return the error envelope when no data is available', async () => {
      mockProvider.getPriceHistory.mockResolvedValue([]);

      const response = await request(app).get('/api/quote/MC.PA').expect(500);

      expect(response.body).toEqual({
        ticker: 'MC.PA',
        success: false,
        error: 'No data available for MC.PA',
      });
      DATA_FIELDS.forEach((field) => expect(response.body).not.toHaveProperty(field));
    });

    it('should use the message of non-Error rejections', async () => {
      mockProvider.getPriceHistory.mockRejectedValue('connection reset');

      const response = await request(app).get('/api/quote/MC.PA').expect(500);

      expect(response.body.error).toBe('connection reset');
    });
  });

  describe('GET /api/nonexistent', () => {
    it('should return 404 for undefined routes', async () => {
      const response = await request(app).get('/api/nonexistent').expect(404);

      expect(response.body).toEqual({
        success: false,
        error: 'Route GET /api/nonexistent not found',
      });
    });
  });
});
