/**
 * @fileoverview Status Catalog Routes
 *
 * Listing, search, registration and lifecycle of dental statuses.
 *
 * @module apps/api/routes/statuses
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import {
  RegisterStatusInputSchema,
  StatusCategorySchema,
  StatusIdSchema,
  UpdateStatusInputSchema,
} from '@dentalcore/types';
import type { ToothHistoryServices } from '../services.js';
import { BooleanQuerySchema, parseRequest } from './request.js';

const StatusParamsSchema = z.object({
  id: StatusIdSchema,
});

const ListQuerySchema = z.object({
  category: StatusCategorySchema.optional(),
  active: BooleanQuerySchema.optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().max(100),
});

export function createStatusRoutes(services: Pick<ToothHistoryServices, 'catalog'>): FastifyPluginAsync {
  const { catalog } = services;

  // eslint-disable-next-line @typescript-eslint/require-await -- Fastify plugin pattern
  const statusRoutes: FastifyPluginAsync = async (fastify) => {
    /**
     * GET /statuses?category=&active=
     */
    fastify.get('/statuses', async (request) => {
      const filter = parseRequest(ListQuerySchema, request.query, 'status filter');
      return { success: true, data: await catalog.list(filter) };
    });

    /**
     * GET /statuses/grouped
     * Active statuses by category
     */
    fastify.get('/statuses/grouped', async () => {
      return { success: true, data: await catalog.listByCategory() };
    });

    /**
     * GET /statuses/search?q=
     */
    fastify.get('/statuses/search', async (request) => {
      const { q } = parseRequest(SearchQuerySchema, request.query, 'search query');
      return { success: true, data: await catalog.search(q) };
    });

    fastify.get('/statuses/:id', async (request) => {
      const { id } = parseRequest(StatusParamsSchema, request.params, 'status id');
      return { success: true, data: await catalog.resolve(id) };
    });

    fastify.post('/statuses', async (request, reply) => {
      const input = parseRequest(RegisterStatusInputSchema, request.body, 'status');
      const status = await catalog.register(input);
      return reply.status(201).send({ success: true, data: status });
    });

    fastify.patch('/statuses/:id', async (request) => {
      const { id } = parseRequest(StatusParamsSchema, request.params, 'status id');
      const patch = parseRequest(UpdateStatusInputSchema, request.body, 'status update');
      return { success: true, data: await catalog.update(id, patch) };
    });

    fastify.post('/statuses/:id/deactivate', async (request) => {
      const { id } = parseRequest(StatusParamsSchema, request.params, 'status id');
      return { success: true, data: await catalog.deactivate(id) };
    });

    fastify.post('/statuses/:id/reactivate', async (request) => {
      const { id } = parseRequest(StatusParamsSchema, request.params, 'status id');
      return { success: true, data: await catalog.reactivate(id) };
    });

    /**
     * DELETE /statuses/:id
     * Fails with 409 while any history stream or chart cell uses the status
     */
    fastify.delete('/statuses/:id', async (request, reply) => {
      const { id } = parseRequest(StatusParamsSchema, request.params, 'status id');
      await catalog.remove(id);
      return reply.status(204).send();
    });
  };

  return statusRoutes;
}
