/**
 * Leads Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { MAX_LEAD_MESSAGE_LENGTH } from '../../core/types.js';

const NullableString = (options: { maxLength: number }) =>
  Type.Union([Type.String(options), Type.Null()]);

// ─────────────────────────────────────────────────────────────────────────────
// Params
// ─────────────────────────────────────────────────────────────────────────────

export const IdParamsSchema = Type.Object(
  { id: Type.String({ minLength: 1, maxLength: 64 }) },
  { additionalProperties: false }
);

export type IdParams = Static<typeof IdParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Request Bodies
// ─────────────────────────────────────────────────────────────────────────────

export const CaptureLeadBodySchema = Type.Object(
  {
    email: Type.String({ minLength: 1, maxLength: 320 }),
    source: Type.Optional(
      Type.String({ maxLength: 50, description: 'direct, referral, social or any other tag' })
    ),
    message: Type.Optional(Type.String({ maxLength: MAX_LEAD_MESSAGE_LENGTH })),
  },
  { additionalProperties: false }
);

export type CaptureLeadBody = Static<typeof CaptureLeadBodySchema>;

export const UpdateLeadBodySchema = Type.Object(
  {
    email: Type.String({ minLength: 1, maxLength: 320 }),
    source: NullableString({ maxLength: 50 }),
    score: Type.Union([Type.Integer({ minimum: 0, maximum: 100 }), Type.Null()]),
    message: NullableString({ maxLength: MAX_LEAD_MESSAGE_LENGTH }),
  },
  { additionalProperties: false }
);

export type UpdateLeadBody = Static<typeof UpdateLeadBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

export const LeadSchema = Type.Object({
  id: Type.String(),
  frogolId: Type.String(),
  email: Type.String(),
  source: Type.Union([Type.String(), Type.Null()]),
  score: Type.Union([Type.Integer(), Type.Null()]),
  message: Type.Union([Type.String(), Type.Null()]),
  createdAt: Type.String({ format: 'date-time' }),
});

export const LeadResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ lead: LeadSchema }),
});

export const LeadListResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ leads: Type.Array(LeadSchema) }),
});

export const DeletedResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ deleted: Type.Boolean() }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.Optional(Type.String()),
});
