/**
 * Auth Module REST Routes
 *
 * - POST /api/v1/auth/register: Create account
 * - POST /api/v1/auth/login: Issue session token (also set as cookie)
 * - POST /api/v1/auth/logout: Revoke the presented token
 * - GET /api/v1/auth/me: Current user (requires auth)
 */

import {
  ErrorResponseSchema,
  LoginBodySchema,
  LoginResponseSchema,
  LogoutResponseSchema,
  RegisterBodySchema,
  UserResponseSchema,
  type LoginBody,
  type RegisterBody,
} from './schemas.js';
import {
  createAuthenticationRequiredError,
  getHttpStatusForError,
  type AuthError,
} from '../../core/errors.js';
import { login } from '../../core/usecases/login.js';
import { logout } from '../../core/usecases/logout.js';
import { register } from '../../core/usecases/register.js';
import { isAuthenticated, SESSION_COOKIE_NAME, type User } from '../../core/types.js';
import { httpSessionExtractor } from '../extractors/http-extractor.js';
import { requireAuthHandler } from '../middleware/fastify-auth.js';

import type {
  PasswordHasher,
  SessionRepository,
  TokenSigner,
  UserRepository,
} from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeAuthRoutesDeps {
  userRepo: UserRepository;
  sessionRepo: SessionRepository;
  passwordHasher: PasswordHasher;
  tokenSigner: TokenSigner;
  /** Marks the session cookie Secure (production) */
  secureCookies: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: AuthError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

const toUserDto = (user: User) => ({
  id: user.id,
  email: user.email,
  createdAt: user.createdAt.toISOString(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeAuthRoutes = (deps: MakeAuthRoutesDeps): FastifyPluginAsync => {
  const { userRepo, sessionRepo, passwordHasher, tokenSigner, secureCookies } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/auth/register
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: RegisterBody }>(
      '/api/v1/auth/register',
      {
        schema: {
          body: RegisterBodySchema,
          response: {
            201: UserResponseSchema,
            400: ErrorResponseSchema,
            409: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await register({ userRepo, passwordHasher }, request.body);

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(201).send({ ok: true, data: toUserDto(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/auth/login
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: LoginBody }>(
      '/api/v1/auth/login',
      {
        schema: {
          body: LoginBodySchema,
          response: {
            200: LoginResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await login(
          { userRepo, sessionRepo, passwordHasher, tokenSigner },
          request.body
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const session = result.value;
        void reply.setCookie(SESSION_COOKIE_NAME, session.token, {
          httpOnly: true,
          path: '/',
          sameSite: 'strict',
          secure: secureCookies,
          expires: session.expiresAt,
        });

        return reply.status(200).send({
          ok: true,
          data: {
            token: session.token,
            userId: session.userId,
            expiresAt: session.expiresAt.toISOString(),
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/auth/logout
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      '/api/v1/auth/logout',
      {
        schema: {
          response: {
            200: LogoutResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const token = httpSessionExtractor.extractToken(request);

        if (token !== null) {
          const result = await logout({ sessionRepo }, { token });
          if (result.isErr()) {
            return sendError(reply, result.error);
          }
        }

        void reply.clearCookie(SESSION_COOKIE_NAME, { path: '/' });

        return reply.status(200).send({ ok: true, data: { loggedOut: token !== null } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/auth/me
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/auth/me',
      {
        preHandler: requireAuthHandler,
        schema: {
          response: {
            200: UserResponseSchema,
            401: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendError(reply, createAuthenticationRequiredError());
        }

        const result = await userRepo.getById(request.auth.userId);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        if (result.value === null) {
          return sendError(reply, createAuthenticationRequiredError());
        }

        return reply.status(200).send({ ok: true, data: toUserDto(result.value) });
      }
    );
  };
};
