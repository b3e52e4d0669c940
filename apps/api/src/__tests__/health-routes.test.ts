import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createTestApp } from './test-app.js';

/**
 * Health Routes Tests
 *
 * - GET /health, /ready, /live
 * - correlation id and not-found handling shared by every route
 */

describe('Health Routes', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('should report the in-memory store as healthy', async () => {
    ({ app } = await createTestApp());

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.status).toBe('ok');
    expect(body.persistence).toBe('memory');
    expect(body.checks.database.status).toBe('ok');
    expect(typeof body.uptime).toBe('number');
  });

  it('should return 503 when the database does not answer', async () => {
    ({ app } = await createTestApp({
      pingDatabase: () => Promise.reject(new Error('connection refused')),
    }));

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(503);
    const body = JSON.parse(health.body);
    expect(body.status).toBe('unhealthy');
    expect(body.persistence).toBe('postgres');
    expect(body.checks.database.message).toBe('connection refused');

    const ready = await app.inject({ method: 'GET', url: '/ready' });
    expect(ready.statusCode).toBe(503);
  });

  it('should be ready when the database answers', async () => {
    ({ app } = await createTestApp({ pingDatabase: () => Promise.resolve() }));

    const response = await app.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body).status).toBe('ready');
  });

  it('should answer the liveness probe', async () => {
    ({ app } = await createTestApp());

    const response = await app.inject({ method: 'GET', url: '/live' });

    expect(JSON.parse(response.body).status).toBe('alive');
  });

  it('should echo the correlation id header', async () => {
    ({ app } = await createTestApp());

    const response = await app.inject({
      method: 'GET',
      url: '/live',
      headers: { 'x-correlation-id': 'corr-test-1' },
    });

    expect(response.headers['x-correlation-id']).toBe('corr-test-1');
  });

  it('should generate a correlation id when none is sent', async () => {
    ({ app } = await createTestApp());

    const response = await app.inject({ method: 'GET', url: '/live' });

    expect(response.headers['x-correlation-id']).toMatch(/^\d+-[a-z0-9]+$/);
  });

  it('should return a JSON 404 for unknown routes', async () => {
    ({ app } = await createTestApp());

    const response = await app.inject({
      method: 'GET',
      url: '/nowhere',
      headers: { 'x-correlation-id': 'corr-test-2' },
    });

    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body)).toEqual({
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
      correlationId: 'corr-test-2',
    });
  });
});
