import express from 'express';
import { z } from 'zod';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { listen, type RunningServer } from '@/test-utils/http.js';
import { validateRequest } from './validation.js';

describe('validateRequest middleware', () => {
  let server: RunningServer;

  const post = (path: string, body: unknown) =>
    fetch(`${server.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  beforeAll(async () => {
    const app = express();
    app.use(express.json());

    const echo = (req: express.Request, res: express.Response) => {
      res.json({ validated: req.validatedData });
    };

    app.post(
      '/items',
      validateRequest(z.object({ name: z.string().min(1), limit: z.number().int().default(10) })),
      echo
    );
    app.post('/batch', validateRequest(z.array(z.string())), echo);
    app.get('/search', validateRequest(z.object({ q: z.string().min(2) }), 'query'), echo);
    app.get('/items/:id', validateRequest(z.object({ id: z.string().regex(/^\d+$/) }), 'params'), echo);

    server = await listen(app);
  });

  afterAll(async () => {
    await server.close();
  });

  it('should attach parsed data with defaults applied', async () => {
    const response = await post('/items', { name: 'trousers' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ validated: { name: 'trousers', limit: 10 } });
  });

  it('should reject invalid bodies with field details', async () => {
    const response = await post('/items', { limit: 2.5 });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: { kind: 'ValidationError', message: 'Validation failed' },
      details: [
        { field: 'name', message: 'Required' },
        { field: 'limit', message: 'Expected integer, received float' },
      ],
    });
  });

  it('should name root-level failures', async () => {
    const response = await post('/batch', { not: 'an array' });
    const body = await response.json();

    expect(response.status).toBe(400);
    expect(body.details).toEqual([{ field: '(root)', message: 'Expected array, received object' }]);
  });

  it('should validate the query string', async () => {
    const ok = await fetch(`${server.baseUrl}/search?q=skirts`);
    const tooShort = await fetch(`${server.baseUrl}/search?q=s`);

    expect(await ok.json()).toEqual({ validated: { q: 'skirts' } });
    expect(tooShort.status).toBe(400);
  });

  it('should validate route params', async () => {
    const ok = await fetch(`${server.baseUrl}/items/42`);
    const bad = await fetch(`${server.baseUrl}/items/abc`);

    expect(await ok.json()).toEqual({ validated: { id: '42' } });
    expect(bad.status).toBe(400);
  });
});
