/**
 * Health check routes
 *
 * - GET /health/live: the process is up; never looks at dependencies
 * - GET /health/ready: every dependency check passes (503 when a critical one fails)
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness } from '../../core/usecases/get-readiness.js';

import type { HealthChecker } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeHealthRoutesDeps {
  version?: string;
  checkers?: HealthChecker[];
}

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const { version, checkers = [] } = deps;
  const startedAt = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const response = await getReadiness(
          { version, checkers },
          {
            uptime: Math.floor((Date.now() - startedAt) / 1000),
            timestamp: new Date().toISOString(),
          }
        );

        return reply.status(response.status === 'unhealthy' ? 503 : 200).send(response);
      }
    );
  };
};
