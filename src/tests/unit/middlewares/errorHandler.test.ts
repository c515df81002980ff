import express from 'express';
import request from 'supertest';
import { errorHandler, toErrorEnvelope } from '@/middlewares/errorHandler';
import { NotFoundError, UpstreamRetrievalError, ValidationError } from '@/errors';

function appThrowing(error: Error): express.Application {
  const app = express();
  app.get('/boom', () => {
    throw error;
  });
  app.use(errorHandler);
  return app;
}

describe('toErrorEnvelope', () => {
  it('should include the ticker when the error carries one', () => {
    expect(toErrorEnvelope(new UpstreamRetrievalError('MC.PA', 'upstream down'))).toEqual({
      ticker: 'MC.PA',
      success: false,
      error: 'upstream down',
    });
  });

  it('should omit the ticker otherwise', () => {
    expect(toErrorEnvelope(new NotFoundError('Route GET /x not found'))).toEqual({
      success: false,
      error: 'Route GET /x not found',
    });
  });
});

describe('errorHandler', () => {
  it('should use the status code of application errors', async () => {
    const app = appThrowing(new ValidationError('ticker: Ticker is required', ' '));

    const response = await request(app).get('/boom').expect(400);

    expect(response.body).toEqual({
      ticker: ' ',
      success: false,
      error: 'ticker: Ticker is required',
    });
  });

  it('should hide the message of unknown errors', async () => {
    const app = appThrowing(new TypeError('x is undefined'));

    const response = await request(app).get('/boom').expect(500);

    expect(response.body).toEqual({ success: false, error: 'Internal server error' });
  });
});

describe('UpstreamRetrievalError.from', () => {
  it('should keep the message and cause of an Error', () => {
    const cause = new Error('socket hang up');
    const error = UpstreamRetrievalError.from('MC.PA', cause);

    expect(error.statusCode).toBe(500);
    expect(error.ticker).toBe('MC.PA');
    expect(error.message).toBe('socket hang up');
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(UpstreamRetrievalError);
  });

  it('should fall back to a generic message for empty errors', () => {
    expect(UpstreamRetrievalError.from('MC.PA', new Error('')).message).toBe(
      'Upstream retrieval failed'
    );
  });

  it('should return an existing UpstreamRetrievalError unchanged', () => {
    const original = new UpstreamRetrievalError('MC.PA', 'No data available for MC.PA');

    expect(UpstreamRetrievalError.from('OTHER', original)).toBe(original);
  });
});
