import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { ValidationError, createLogger, isOperationalError } from '@dentalcore/core';
import correlationPlugin from './plugins/correlation.js';
import {
  createChartRoutes,
  createHealthRoutes,
  createStatusRoutes,
  createToothHistoryRoutes,
} from './routes/index.js';
import type { ToothHistoryServices } from './services.js';

/**
 * Tooth History API
 *
 * HTTP surface over the status catalog, the tooth history ledger and the
 * examination charts.
 */

const logger = createLogger({ name: 'api' });

export interface BuildAppOptions {
  services: ToothHistoryServices;
  /** Pino level for request logs; false disables the Fastify logger */
  logLevel?: string | false;
  /** Comma-separated list of allowed origins */
  corsOrigin?: string;
  isProduction?: boolean;
  pingDatabase?: () => Promise<void>;
}

/**
 * SECURITY: Parse and validate CORS origins
 * Only allows specific origins, never wildcard in production
 */
export function parseCorsOrigins(corsOrigin: string | undefined, isProduction: boolean): string[] | false {
  if (!corsOrigin) return false;

  if (corsOrigin === '*') {
    if (isProduction) {
      throw new Error('SECURITY: CORS_ORIGIN cannot be "*" in production');
    }
    logger.warn('CORS_ORIGIN is "*" - using localhost defaults for development');
    return ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'];
  }

  const origins = corsOrigin
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  for (const origin of origins) {
    if (!URL.canParse(origin)) {
      throw new Error(`SECURITY: Invalid CORS origin: ${origin}`);
    }
  }

  return origins;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const corsOrigins = parseCorsOrigins(options.corsOrigin, options.isProduction ?? false);
  const logLevel = options.logLevel ?? 'info';

  const fastify = Fastify({
    logger:
      logLevel === false
        ? false
        : {
            level: logLevel,
            serializers: {
              req(request) {
                return {
                  method: request.method,
                  url: request.url,
                  remoteAddress: request.ip,
                };
              },
              res(reply) {
                return {
                  statusCode: reply.statusCode,
                };
              },
            },
          },
  });

  await fastify.register(correlationPlugin);

  await fastify.register(helmet, {
    contentSecurityPolicy: false, // JSON only
    frameguard: { action: 'deny' },
    noSniff: true,
    hidePoweredBy: true,
  });

  await fastify.register(cors, {
    origin: corsOrigins,
    methods: ['GET', 'POST', 'PATCH', 'DELETE'],
  });

  await fastify.register(createHealthRoutes({ pingDatabase: options.pingDatabase }));
  await fastify.register(createStatusRoutes(options.services));
  await fastify.register(createToothHistoryRoutes(options.services));
  await fastify.register(createChartRoutes(options.services));

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const correlationId = request.correlationId;

    if (isOperationalError(error)) {
      const safe = error.toSafeError();
      if (safe.statusCode >= 500) {
        request.log.error({ err: error, correlationId }, 'Operation failed');
      } else {
        request.log.info({ code: safe.code, correlationId }, 'Request rejected');
      }
      return reply.status(safe.statusCode).send({
        ...safe,
        ...(error instanceof ValidationError ? { details: error.details } : {}),
        correlationId,
      });
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        code: error.code,
        message: error.message,
        statusCode,
        correlationId,
      });
    }

    request.log.error({ err: error, correlationId }, 'Unhandled error');
    return reply.status(500).send({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      statusCode: 500,
      correlationId,
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
      correlationId: request.correlationId,
    });
  });

  return fastify;
}
