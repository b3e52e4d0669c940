/**
 * @fileoverview Tooth History Routes
 *
 * Append and roll back observations, read streams, the merged timeline,
 * the current status of one tooth and the whole-mouth summary.
 *
 * Tooth numbers arrive as FDI two-digit path segments (11..48).
 *
 * @module apps/api/routes/tooth-history
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import {
  AppendHistoryInputSchema,
  EntityIdSchema,
  HistorySourceSchema,
} from '@dentalcore/types';
import type { ToothHistoryServices } from '../services.js';
import { PatientParamsSchema, ToothParamsSchema, parseRequest } from './request.js';

const AppendBodySchema = AppendHistoryInputSchema.omit({ patientId: true, toothNumber: true });

const ReadQuerySchema = z.object({
  source: HistorySourceSchema.optional(),
});

const RollbackParamsSchema = ToothParamsSchema.extend({
  source: HistorySourceSchema,
});

const StatisticsQuerySchema = z.object({
  patientId: EntityIdSchema.optional(),
  recentDays: z.coerce.number().int().min(1).max(3650).optional(),
});

export function createToothHistoryRoutes(
  services: Pick<ToothHistoryServices, 'ledger' | 'resolver' | 'timeline'>
): FastifyPluginAsync {
  const { ledger, resolver, timeline } = services;

  // eslint-disable-next-line @typescript-eslint/require-await -- Fastify plugin pattern
  const toothHistoryRoutes: FastifyPluginAsync = async (fastify) => {
    /**
     * POST /patients/:patientId/teeth/:toothNumber/history
     * Body: { source, status, description?, date? }
     */
    fastify.post('/patients/:patientId/teeth/:toothNumber/history', async (request, reply) => {
      const { patientId, toothNumber } = parseRequest(ToothParamsSchema, request.params, 'tooth');
      const body = parseRequest(AppendBodySchema, request.body, 'history entry');

      const streamId = await ledger.append({ ...body, patientId, toothNumber });
      return reply.status(201).send({ success: true, data: { streamId } });
    });

    fastify.get('/patients/:patientId/teeth/:toothNumber/history', async (request) => {
      const { patientId, toothNumber } = parseRequest(ToothParamsSchema, request.params, 'tooth');
      const { source } = parseRequest(ReadQuerySchema, request.query, 'history query');

      return { success: true, data: await ledger.read(patientId, toothNumber, source) };
    });

    /**
     * DELETE /patients/:patientId/teeth/:toothNumber/history/:source/last
     * `rolledBack: false` when the stream does not exist
     */
    fastify.delete(
      '/patients/:patientId/teeth/:toothNumber/history/:source/last',
      async (request) => {
        const { patientId, toothNumber, source } = parseRequest(
          RollbackParamsSchema,
          request.params,
          'history stream'
        );

        const rolledBack = await ledger.rollbackLast(patientId, toothNumber, source);
        return { success: true, data: { rolledBack } };
      }
    );

    fastify.get('/patients/:patientId/teeth/:toothNumber/full-history', async (request) => {
      const { patientId, toothNumber } = parseRequest(ToothParamsSchema, request.params, 'tooth');
      return { success: true, data: await ledger.fullHistory(patientId, toothNumber) };
    });

    fastify.get('/patients/:patientId/teeth/:toothNumber/timeline', async (request) => {
      const { patientId, toothNumber } = parseRequest(ToothParamsSchema, request.params, 'tooth');
      return { success: true, data: await timeline.timeline(patientId, toothNumber) };
    });

    fastify.get('/patients/:patientId/teeth/:toothNumber/status', async (request) => {
      const { patientId, toothNumber } = parseRequest(ToothParamsSchema, request.params, 'tooth');
      return { success: true, data: await resolver.currentStatus(patientId, toothNumber) };
    });

    /**
     * GET /patients/:patientId/mouth-summary
     * Current status of all 32 teeth, keyed by tooth number
     */
    fastify.get('/patients/:patientId/mouth-summary', async (request) => {
      const { patientId } = parseRequest(PatientParamsSchema, request.params, 'patient');
      const summary = await resolver.mouthSummary(patientId);

      return {
        success: true,
        data: {
          patientId,
          teeth: Object.fromEntries(summary.map((tooth) => [String(tooth.toothNumber), tooth])),
        },
      };
    });

    fastify.get('/history/statistics', async (request) => {
      const query = parseRequest(StatisticsQuerySchema, request.query, 'statistics query');
      return { success: true, data: await ledger.statistics(query) };
    });
  };

  return toothHistoryRoutes;
}
