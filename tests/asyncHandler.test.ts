/**
 * asyncHandler wraps every route handler, so a rejection that does not reach
 * next() would bypass the error middleware.
 */

import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { asyncHandler } from '../src/utils/asyncHandler.js';
import { AppError, errorHandler } from '../src/middleware/errorHandler.js';

function appWith(handler: () => Promise<unknown>) {
  const app = express();
  app.get('/pulse', asyncHandler(handler));
  app.use(errorHandler);
  return app;
}

describe('asyncHandler', () => {
  it('sends a rejected AppError through the error middleware', async () => {
    const app = appWith(async () => {
      throw new AppError(404, 'ARTICLE_NOT_FOUND', 'Article not found');
    });

    const res = await request(app).get('/pulse');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'ARTICLE_NOT_FOUND', message: 'Article not found' },
    });
  });

  it('turns an unexpected rejection into a 500', async () => {
    const app = appWith(async () => {
      throw new Error('snapshot store unavailable');
    });

    const res = await request(app).get('/pulse');

    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe('INTERNAL_ERROR');
  });

  it('leaves a successful response untouched', async () => {
    const app = express();
    app.get(
      '/pulse',
      asyncHandler(async (_req, res) => {
        res.json({ success: true, data: { global: [] } });
      }),
    );
    app.use(errorHandler);

    const res = await request(app).get('/pulse');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, data: { global: [] } });
  });
});
