/**
 * Health check routes
 *
 * Endpoints:
 * - GET /health/live - Liveness probe (is the process alive?)
 */

import { LivenessResponseSchema, type HealthDeps, type LivenessResponse } from '../../core/types.js';

import type { FastifyPluginAsync } from 'fastify';

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: HealthDeps = {}): FastifyPluginAsync => {
  const { version } = deps;
  const startTime = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      {
        schema: {
          response: {
            200: LivenessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({
          status: 'ok',
          uptime: Math.floor((Date.now() - startTime) / 1000),
          ...(version !== undefined && { version }),
        });
      }
    );
  };
};
