/**
 * Auth Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { MIN_PASSWORD_LENGTH } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RegisterBodySchema = Type.Object(
  {
    email: Type.String({ minLength: 3, maxLength: 320 }),
    password: Type.String({ minLength: MIN_PASSWORD_LENGTH, maxLength: 1024 }),
  },
  { additionalProperties: false }
);

export type RegisterBody = Static<typeof RegisterBodySchema>;

export const LoginBodySchema = Type.Object(
  {
    email: Type.String({ minLength: 1, maxLength: 320 }),
    password: Type.String({ minLength: 1, maxLength: 1024 }),
  },
  { additionalProperties: false }
);

export type LoginBody = Static<typeof LoginBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const UserDataSchema = Type.Object({
  id: Type.String(),
  email: Type.String(),
  createdAt: Type.String({ format: 'date-time' }),
});

export const UserResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: UserDataSchema,
});

export const LoginResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    token: Type.String(),
    userId: Type.String(),
    expiresAt: Type.String({ format: 'date-time' }),
  }),
});

export const LogoutResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ loggedOut: Type.Boolean() }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
