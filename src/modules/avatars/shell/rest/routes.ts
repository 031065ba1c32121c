/**
 * Avatars Module REST Routes
 *
 * - POST /api/v1/frogols/:id/avatar: Replace the avatar (multipart, one or more files)
 * - DELETE /api/v1/frogols/:id/avatar: Remove the avatar
 */

import { Type, type Static } from '@sinclair/typebox';

import { isAuthenticated } from '../../../auth/core/types.js';
import { requireAuthHandler } from '../../../auth/shell/middleware/fastify-auth.js';
import { FROGOL_ERROR_HTTP_STATUS, type FrogolError } from '../../../frogols/core/errors.js';
import { getOwnedFrogol } from '../../../frogols/core/usecases/get-frogol.js';
import { AVATAR_ERROR_HTTP_STATUS, type AvatarError } from '../../core/errors.js';
import { clearAvatar } from '../../core/usecases/clear-avatar.js';
import { uploadAvatars, type UploadAvatarsDeps } from '../../core/usecases/upload-avatars.js';

import type { FrogolRepository } from '../../../frogols/core/ports.js';
import type { AvatarUpload } from '../../core/types.js';
import type { MultipartFile } from '@fastify/multipart';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const IdParamsSchema = Type.Object(
  { id: Type.String({ minLength: 1, maxLength: 64 }) },
  { additionalProperties: false }
);

type IdParams = Static<typeof IdParamsSchema>;

const UploadAvatarsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    filenames: Type.Array(Type.String()),
    avatarUrl: Type.Union([Type.String(), Type.Null()]),
    errors: Type.Array(
      Type.Object({
        filename: Type.Union([Type.String(), Type.Null()]),
        type: Type.String(),
        message: Type.String(),
      })
    ),
  }),
});

const ClearAvatarResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ deleted: Type.Boolean() }),
});

const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.Optional(Type.String()),
});

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeAvatarRoutesDeps extends UploadAvatarsDeps {
  frogolRepo: FrogolRepository;
}

type AvatarRouteError = AvatarError | FrogolError;

const AVATAR_ROUTE_HTTP_STATUS: Record<AvatarRouteError['type'], number> = {
  ...FROGOL_ERROR_HTTP_STATUS,
  ...AVATAR_ERROR_HTTP_STATUS,
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

function sendError(reply: FastifyReply, error: AvatarRouteError) {
  const status = AVATAR_ROUTE_HTTP_STATUS[error.type];
  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: status >= 500 ? 'An unexpected error occurred' : error.message,
  });
}

const toAvatarUpload = async (part: MultipartFile): Promise<AvatarUpload> => ({
  filename: part.filename === '' ? null : part.filename,
  contentType: part.mimetype === '' ? null : part.mimetype,
  data: await part.toBuffer(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeAvatarRoutes = (deps: MakeAvatarRoutesDeps): FastifyPluginAsync => {
  const { frogolRepo } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/frogols/:id/avatar - Upload avatar
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: IdParams }>(
      '/api/v1/frogols/:id/avatar',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          response: {
            200: UploadAvatarsResponseSchema,
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

        // Each part is read before the next one arrives
        const files: AvatarUpload[] = [];
        for await (const part of request.files()) {
          files.push(await toAvatarUpload(part));
        }

        const result = await uploadAvatars(deps, { frogolId: request.params.id, files });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const firstError = result.value.errors[0];
        if (result.value.filenames.length === 0 && firstError !== undefined) {
          return reply.status(400).send({
            ok: false,
            error: firstError.type,
            message: firstError.message,
          });
        }

        request.log.info(
          { frogolId: request.params.id, stored: result.value.filenames.length },
          'Avatar uploaded'
        );

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /api/v1/frogols/:id/avatar - Remove avatar
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete<{ Params: IdParams }>(
      '/api/v1/frogols/:id/avatar',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: IdParamsSchema,
          response: {
            200: ClearAvatarResponseSchema,
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

        const result = await clearAvatar(deps, { frogolId: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { deleted: true } });
      }
    );
  };
};
