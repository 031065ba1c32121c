/**
 * Leads Module REST Routes
 *
 * - POST /api/v1/public/frogols/:id/leads: Capture a lead (public)
 * - GET /api/v1/frogols/:id/leads: Leads of an owned profile
 * - PUT/DELETE /api/v1/leads/:id: Edit or remove a lead of an owned profile
 */

import { ok, err, type Result } from 'neverthrow';

import {
  CaptureLeadBodySchema,
  DeletedResponseSchema,
  ErrorResponseSchema,
  IdParamsSchema,
  LeadListResponseSchema,
  LeadResponseSchema,
  UpdateLeadBodySchema,
  type CaptureLeadBody,
  type IdParams,
  type UpdateLeadBody,
} from './schemas.js';
import { isAuthenticated } from '../../../auth/core/types.js';
import { requireAuthHandler } from '../../../auth/shell/middleware/fastify-auth.js';
import { FROGOL_ERROR_HTTP_STATUS, type FrogolError } from '../../../frogols/core/errors.js';
import { getFrogolById, getOwnedFrogol } from '../../../frogols/core/usecases/get-frogol.js';
import {
  LEAD_ERROR_HTTP_STATUS,
  createLeadNotFoundError,
  type LeadError,
} from '../../core/errors.js';
import { captureLead } from '../../core/usecases/capture-lead.js';
import { deleteLead, getLead, listLeads, updateLead } from '../../core/usecases/manage-leads.js';

import type { FrogolRepository } from '../../../frogols/core/ports.js';
import type { LeadRepository } from '../../core/ports.js';
import type { Lead } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeLeadRoutesDeps {
  leadRepo: LeadRepository;
  frogolRepo: FrogolRepository;
}

type LeadRouteError = LeadError | FrogolError;

const LEAD_ROUTE_HTTP_STATUS: Record<LeadRouteError['type'], number> = {
  ...FROGOL_ERROR_HTTP_STATUS,
  ...LEAD_ERROR_HTTP_STATUS,
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendUnauthorized(reply: FastifyReply) {
  return reply.status(401).send({
    ok: false,
    error: 'Unauthorized',
    message: 'Authentication required',
  });
}

function sendError(reply: FastifyReply, error: LeadRouteError) {
  const status = LEAD_ROUTE_HTTP_STATUS[error.type];
  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: status >= 500 ? 'An unexpected error occurred' : error.message,
  });
}

const toLeadDto = (lead: Lead) => ({
  ...lead,
  createdAt: lead.createdAt.toISOString(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeLeadRoutes = (deps: MakeLeadRoutesDeps): FastifyPluginAsync => {
  const { leadRepo, frogolRepo } = deps;

  /**
   * Loads a lead whose profile belongs to the user.
   * Leads of other users' profiles are reported as not found.
   */
  const findOwnedLead = async (
    id: string,
    userId: string
  ): Promise<Result<Lead, LeadRouteError>> => {
    const leadResult = await getLead({ leadRepo }, { id });
    if (leadResult.isErr()) {
      return err(leadResult.error);
    }

    const frogolResult = await getOwnedFrogol(
      { frogolRepo },
      { id: leadResult.value.frogolId, userId }
    );
    if (frogolResult.isErr()) {
      return err(
        frogolResult.error.type === 'FrogolNotFoundError'
          ? createLeadNotFoundError(id)
          : frogolResult.error
      );
    }

    return ok(leadResult.value);
  };

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/public/frogols/:id/leads - Capture lead
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: IdParams; Body: CaptureLeadBody }>(
      '/api/v1/public/frogols/:id/leads',
      {
        schema: {
          params: IdParamsSchema,
          body: CaptureLeadBodySchema,
          response: {
            201: LeadResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const frogolResult = await getFrogolById({ frogolRepo }, { id: request.params.id });
        if (frogolResult.isErr()) {
          return sendError(reply, frogolResult.error);
        }

        const { email, source, message } = request.body;
        const result = await captureLead(
          { leadRepo },
          {
            frogolId: request.params.id,
            email,
            ...(source !== undefined && { source }),
            ...(message !== undefined && { message }),
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(201).send({ ok: true, data: { lead: toLeadDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/frogols/:id/leads - List leads
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IdParams }>(
      '/api/v1/frogols/:id/leads',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          response: {
            200: LeadListResponseSchema,
            401: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const owned = await getOwnedFrogol(
          { frogolRepo },
          { id: request.params.id, userId: request.auth.userId }
        );
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await listLeads({ leadRepo }, { frogolId: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { leads: result.value.map(toLeadDto) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /api/v1/leads/:id - Update lead
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: IdParams; Body: UpdateLeadBody }>(
      '/api/v1/leads/:id',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          body: UpdateLeadBodySchema,
          response: {
            200: LeadResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const owned = await findOwnedLead(request.params.id, request.auth.userId);
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await updateLead({ leadRepo }, { id: request.params.id, ...request.body });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { lead: toLeadDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /api/v1/leads/:id - Delete lead
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete<{ Params: IdParams }>(
      '/api/v1/leads/:id',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          response: {
            200: DeletedResponseSchema,
            401: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const owned = await findOwnedLead(request.params.id, request.auth.userId);
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await deleteLead({ leadRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { deleted: true } });
      }
    );
  };
};
