/**
 * @fileoverview Examination Chart Routes
 *
 * @module apps/api/routes/charts
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '@dentalcore/core';
import { ChartCellPatchSchema } from '@dentalcore/types';
import type { ToothHistoryServices } from '../services.js';
import { ExaminationParamsSchema, parseRequest } from './request.js';

const CellParamsSchema = ExaminationParamsSchema.extend({
  quadrant: z.coerce.number().int(),
  position: z.coerce.number().int(),
});

export function createChartRoutes(services: Pick<ToothHistoryServices, 'charts'>): FastifyPluginAsync {
  const { charts } = services;

  // eslint-disable-next-line @typescript-eslint/require-await -- Fastify plugin pattern
  const chartRoutes: FastifyPluginAsync = async (fastify) => {
    /**
     * POST /patients/:patientId/examinations/:examinationId/chart
     * 201 when the 32 cells were created, 200 when the chart already existed
     */
    fastify.post(
      '/patients/:patientId/examinations/:examinationId/chart',
      async (request, reply) => {
        const { patientId, examinationId } = parseRequest(
          ExaminationParamsSchema,
          request.params,
          'examination'
        );

        const result = await charts.initialize(patientId, examinationId);
        return reply.status(result.created ? 201 : 200).send({ success: true, data: result });
      }
    );

    fastify.get('/patients/:patientId/examinations/:examinationId/chart', async (request) => {
      const { patientId, examinationId } = parseRequest(
        ExaminationParamsSchema,
        request.params,
        'examination'
      );
      return { success: true, data: await charts.getChart(patientId, examinationId) };
    });

    fastify.get(
      '/patients/:patientId/examinations/:examinationId/chart/:quadrant/:position',
      async (request) => {
        const { patientId, examinationId, quadrant, position } = parseRequest(
          CellParamsSchema,
          request.params,
          'chart cell'
        );

        const cell = await charts.getCell(patientId, examinationId, quadrant, position);
        if (!cell) {
          throw new NotFoundError('Chart cell');
        }
        return { success: true, data: cell };
      }
    );

    /**
     * PATCH /patients/:patientId/examinations/:examinationId/chart/:quadrant/:position
     * Body: any of { diagnosis, treatmentPerformed, status }
     */
    fastify.patch(
      '/patients/:patientId/examinations/:examinationId/chart/:quadrant/:position',
      async (request) => {
        const { patientId, examinationId, quadrant, position } = parseRequest(
          CellParamsSchema,
          request.params,
          'chart cell'
        );
        const fields = parseRequest(ChartCellPatchSchema, request.body, 'chart cell update');

        return {
          success: true,
          data: await charts.updateCell(patientId, examinationId, quadrant, position, fields),
        };
      }
    );
  };

  return chartRoutes;
}
