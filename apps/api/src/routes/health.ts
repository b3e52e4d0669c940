import type { FastifyPluginAsync } from 'fastify';
import { toError } from '@dentalcore/core';

interface HealthCheckResult {
  status: 'ok' | 'error';
  message?: string;
  latencyMs?: number;
}

interface HealthResponse {
  status: 'ok' | 'unhealthy' | 'ready' | 'alive';
  timestamp: string;
  version?: string;
  uptime?: number;
  persistence?: 'postgres' | 'memory';
  checks?: Record<string, HealthCheckResult>;
}

export interface HealthRouteOptions {
  /** Round-trip to the database; absent when running on the in-memory store */
  pingDatabase?: () => Promise<void>;
}

/**
 * Check database connectivity with a timed round-trip
 */
async function checkDatabase(options: HealthRouteOptions): Promise<HealthCheckResult> {
  if (!options.pingDatabase) {
    return { status: 'ok', message: 'not configured (using in-memory store)' };
  }

  const startTime = Date.now();
  try {
    await options.pingDatabase();
    return { status: 'ok', latencyMs: Date.now() - startTime };
  } catch (error) {
    return {
      status: 'error',
      message: toError(error).message,
      latencyMs: Date.now() - startTime,
    };
  }
}

/**
 * Health check routes
 *
 * - GET /health: status with dependency checks, 503 when the database is down
 * - GET /ready: readiness probe
 * - GET /live: liveness probe
 */
export function createHealthRoutes(options: HealthRouteOptions = {}): FastifyPluginAsync {
  const persistence = options.pingDatabase ? 'postgres' : 'memory';

  // eslint-disable-next-line @typescript-eslint/require-await -- Fastify plugin pattern
  const healthRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
      const database = await checkDatabase(options);
      const status = database.status === 'ok' ? 'ok' : 'unhealthy';

      return reply.status(status === 'ok' ? 200 : 503).send({
        status,
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version ?? '0.1.0',
        uptime: process.uptime(),
        persistence,
        checks: { database },
      });
    });

    fastify.get<{ Reply: HealthResponse }>('/ready', async (_request, reply) => {
      const database = await checkDatabase(options);

      if (database.status !== 'ok') {
        return reply.status(503).send({
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          checks: { database },
        });
      }
      return { status: 'ready', timestamp: new Date().toISOString(), checks: { database } };
    });

    fastify.get<{ Reply: HealthResponse }>('/live', async () => {
      return {
        status: 'alive',
        timestamp: new Date().toISOString(),
      };
    });
  };

  return healthRoutes;
}
