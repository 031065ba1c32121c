/**
 * Frogols Module REST Routes
 *
 * Public:
 * - GET /api/v1/public/frogols/:slug: Profile and active links
 * - GET /api/v1/links/:id/click: Record a click and redirect to the link
 *
 * Owner only (requires auth; other users' profiles and links are 404):
 * - GET/POST /api/v1/frogols, GET/PUT/DELETE /api/v1/frogols/:id
 * - GET/POST /api/v1/frogols/:id/links
 * - PUT /api/v1/links/order, PUT/DELETE /api/v1/links/:id, PUT /api/v1/links/:id/active
 * - GET /api/v1/frogols/:id/stats, GET /api/v1/analytics
 */

import {
  ClickStatsResponseSchema,
  CreateFrogolBodySchema,
  DeletedResponseSchema,
  ErrorResponseSchema,
  FrogolListResponseSchema,
  FrogolResponseSchema,
  IdParamsSchema,
  LinkBodySchema,
  LinkListResponseSchema,
  LinkResponseSchema,
  ListLinksQuerySchema,
  PublicProfileResponseSchema,
  ReorderLinksBodySchema,
  ReorderLinksResponseSchema,
  SetLinkActiveBodySchema,
  SlugParamsSchema,
  UpdateFrogolBodySchema,
  UserAnalyticsResponseSchema,
  type CreateFrogolBody,
  type IdParams,
  type LinkBody,
  type ListLinksQuery,
  type ReorderLinksBody,
  type SetLinkActiveBody,
  type SlugParams,
  type UpdateFrogolBody,
} from './schemas.js';
import { isAuthenticated } from '../../../auth/core/types.js';
import { requireAuthHandler } from '../../../auth/shell/middleware/fastify-auth.js';
import { getHttpStatusForError, type FrogolError } from '../../core/errors.js';
import { addLink } from '../../core/usecases/add-link.js';
import { createFrogol } from '../../core/usecases/create-frogol.js';
import { deleteFrogol } from '../../core/usecases/delete-frogol.js';
import { getClickStats } from '../../core/usecases/get-click-stats.js';
import { getOwnedFrogol } from '../../core/usecases/get-frogol.js';
import { getPublicProfile } from '../../core/usecases/get-public-profile.js';
import { getUserAnalytics } from '../../core/usecases/get-user-analytics.js';
import { listUserFrogols } from '../../core/usecases/list-user-frogols.js';
import {
  deleteLink,
  getOwnedLink,
  listLinks,
  setLinkActive,
  updateLink,
} from '../../core/usecases/manage-links.js';
import { reorderLinks } from '../../core/usecases/reorder-links.js';
import { trackClick } from '../../core/usecases/track-click.js';
import { updateFrogol } from '../../core/usecases/update-frogol.js';

import type { ClickRepository, FrogolRepository, LinkRepository } from '../../core/ports.js';
import type { Frogol, FrogolSummary, Link, UserAnalytics } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeFrogolRoutesDeps {
  frogolRepo: FrogolRepository;
  linkRepo: LinkRepository;
  clickRepo: ClickRepository;
}

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

function sendError(reply: FastifyReply, error: FrogolError) {
  const status = getHttpStatusForError(error);
  return reply.status(status).send({
    ok: false,
    error: error.type,
    // Store failures are logged by the repositories
    message: status >= 500 ? 'An unexpected error occurred' : error.message,
  });
}

export const toFrogolDto = (frogol: Frogol) => ({
  ...frogol,
  createdAt: frogol.createdAt.toISOString(),
});

export const toLinkDto = (link: Link) => ({
  ...link,
  createdAt: link.createdAt.toISOString(),
});

const toSummaryDto = (summary: FrogolSummary) => ({
  ...summary,
  createdAt: summary.createdAt.toISOString(),
});

const toAnalyticsDto = (analytics: UserAnalytics) => ({
  ...analytics,
  topFrogols: analytics.topFrogols.map(toSummaryDto),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeFrogolRoutes = (deps: MakeFrogolRoutesDeps): FastifyPluginAsync => {
  const { frogolRepo, linkRepo, clickRepo } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/public/frogols/:slug - Public profile
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: SlugParams }>(
      '/api/v1/public/frogols/:slug',
      {
        schema: {
          params: SlugParamsSchema,
          response: {
            200: PublicProfileResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getPublicProfile(
          { frogolRepo, linkRepo },
          { slug: request.params.slug }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: {
            frogol: toFrogolDto(result.value.frogol),
            links: result.value.links.map(toLinkDto),
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/links/:id/click - Track click and redirect
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IdParams }>(
      '/api/v1/links/:id/click',
      {
        schema: {
          params: IdParamsSchema,
          response: {
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const userAgent = request.headers['user-agent'];

        const result = await trackClick(
          { linkRepo, clickRepo },
          {
            linkId: request.params.id,
            ipAddress: request.ip,
            ...(userAgent !== undefined && { userAgent }),
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.redirect(result.value.url, 302);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/frogols - Current user's profiles
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/frogols',
      {
        preHandler: requireAuthHandler,
        schema: {
          response: {
            200: FrogolListResponseSchema,
            401: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await listUserFrogols({ frogolRepo }, { userId: request.auth.userId });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: { frogols: result.value.map(toSummaryDto) },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/frogols - Create profile
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: CreateFrogolBody }>(
      '/api/v1/frogols',
      {
        preHandler: requireAuthHandler,
        schema: {
          body: CreateFrogolBodySchema,
          response: {
            201: FrogolResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            409: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await createFrogol(
          { frogolRepo },
          {
            userId: request.auth.userId,
            slug: request.body.slug,
            displayName: request.body.displayName,
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(201).send({ ok: true, data: { frogol: toFrogolDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/frogols/:id - Owned profile
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IdParams }>(
      '/api/v1/frogols/:id',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          response: {
            200: FrogolResponseSchema,
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

        const result = await getOwnedFrogol(
          { frogolRepo },
          { id: request.params.id, userId: request.auth.userId }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { frogol: toFrogolDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /api/v1/frogols/:id - Update profile
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: IdParams; Body: UpdateFrogolBody }>(
      '/api/v1/frogols/:id',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          body: UpdateFrogolBodySchema,
          response: {
            200: FrogolResponseSchema,
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

        const { displayName, theme, avatarUrl, bio } = request.body;
        const result = await updateFrogol(
          { frogolRepo },
          {
            id: request.params.id,
            displayName,
            theme,
            ...(avatarUrl !== undefined && { avatarUrl }),
            ...(bio !== undefined && { bio }),
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { frogol: toFrogolDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /api/v1/frogols/:id - Delete profile
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete<{ Params: IdParams }>(
      '/api/v1/frogols/:id',
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

        const owned = await getOwnedFrogol(
          { frogolRepo },
          { id: request.params.id, userId: request.auth.userId }
        );
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await deleteFrogol({ frogolRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { deleted: true } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/frogols/:id/links - Links of an owned profile
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IdParams; Querystring: ListLinksQuery }>(
      '/api/v1/frogols/:id/links',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          querystring: ListLinksQuerySchema,
          response: {
            200: LinkListResponseSchema,
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

        const result = await listLinks(
          { linkRepo },
          { frogolId: request.params.id, includeInactive: request.query.all === true }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { links: result.value.map(toLinkDto) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/frogols/:id/links - Add link
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: IdParams; Body: LinkBody }>(
      '/api/v1/frogols/:id/links',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          body: LinkBodySchema,
          response: {
            201: LinkResponseSchema,
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

        const owned = await getOwnedFrogol(
          { frogolRepo },
          { id: request.params.id, userId: request.auth.userId }
        );
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await addLink(
          { linkRepo },
          { frogolId: request.params.id, url: request.body.url, label: request.body.label }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(201).send({ ok: true, data: { link: toLinkDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /api/v1/links/order - Reorder links
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Body: ReorderLinksBody }>(
      '/api/v1/links/order',
      {
        preHandler: requireAuthHandler,
        schema: {
          body: ReorderLinksBodySchema,
          response: {
            200: ReorderLinksResponseSchema,
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

        const [firstId] = request.body.ids;
        if (firstId !== undefined) {
          // The first id selects the profile, so it alone is checked for ownership
          const owned = await getOwnedLink(
            { frogolRepo, linkRepo },
            { id: firstId, userId: request.auth.userId }
          );
          if (owned.isErr()) {
            return sendError(reply, owned.error);
          }
        }

        const result = await reorderLinks({ linkRepo }, { linkIds: request.body.ids });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { ids: result.value.orderedIds } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /api/v1/links/:id - Update link
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: IdParams; Body: LinkBody }>(
      '/api/v1/links/:id',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          body: LinkBodySchema,
          response: {
            200: LinkResponseSchema,
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

        const owned = await getOwnedLink(
          { frogolRepo, linkRepo },
          { id: request.params.id, userId: request.auth.userId }
        );
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await updateLink(
          { linkRepo },
          { id: request.params.id, url: request.body.url, label: request.body.label }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { link: toLinkDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /api/v1/links/:id/active - Toggle link visibility
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: IdParams; Body: SetLinkActiveBody }>(
      '/api/v1/links/:id/active',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          body: SetLinkActiveBodySchema,
          response: {
            200: LinkResponseSchema,
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

        const owned = await getOwnedLink(
          { frogolRepo, linkRepo },
          { id: request.params.id, userId: request.auth.userId }
        );
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await setLinkActive(
          { linkRepo },
          { id: request.params.id, isActive: request.body.isActive }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { link: toLinkDto(result.value) } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /api/v1/links/:id - Delete link
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete<{ Params: IdParams }>(
      '/api/v1/links/:id',
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

        const owned = await getOwnedLink(
          { frogolRepo, linkRepo },
          { id: request.params.id, userId: request.auth.userId }
        );
        if (owned.isErr()) {
          return sendError(reply, owned.error);
        }

        const result = await deleteLink({ linkRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { deleted: true } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/frogols/:id/stats - Click statistics
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IdParams }>(
      '/api/v1/frogols/:id/stats',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          response: {
            200: ClickStatsResponseSchema,
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

        const result = await getClickStats({ clickRepo }, { frogolId: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { stats: result.value } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/analytics - Account-wide analytics
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/analytics',
      {
        preHandler: requireAuthHandler,
        schema: {
          response: {
            200: UserAnalyticsResponseSchema,
            401: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await getUserAnalytics({ frogolRepo }, { userId: request.auth.userId });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: { analytics: toAnalyticsDto(result.value) },
        });
      }
    );
  };
};
