/**
 * Frogols Module REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 */

import { Type, type Static, type TProperties } from '@sinclair/typebox';

import { MAX_SLUG_INPUT_LENGTH, MAX_URL_LENGTH } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Params & Query
// ─────────────────────────────────────────────────────────────────────────────

export const IdParamsSchema = Type.Object(
  { id: Type.String({ minLength: 1, maxLength: 64 }) },
  { additionalProperties: false }
);

export type IdParams = Static<typeof IdParamsSchema>;

export const SlugParamsSchema = Type.Object(
  { slug: Type.String({ minLength: 1, maxLength: MAX_SLUG_INPUT_LENGTH }) },
  { additionalProperties: false }
);

export type SlugParams = Static<typeof SlugParamsSchema>;

export const ListLinksQuerySchema = Type.Object(
  {
    all: Type.Optional(Type.Boolean({ description: 'Include inactive links' })),
  },
  { additionalProperties: false }
);

export type ListLinksQuery = Static<typeof ListLinksQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Request Bodies
// ─────────────────────────────────────────────────────────────────────────────

export const CreateFrogolBodySchema = Type.Object(
  {
    slug: Type.String({
      minLength: 1,
      maxLength: MAX_SLUG_INPUT_LENGTH,
      description: 'Desired slug; normalized before use',
    }),
    displayName: Type.String({ maxLength: 200 }),
  },
  { additionalProperties: false }
);

export type CreateFrogolBody = Static<typeof CreateFrogolBodySchema>;

export const UpdateFrogolBodySchema = Type.Object(
  {
    displayName: Type.String({ maxLength: 200 }),
    theme: Type.String({ maxLength: 100 }),
    avatarUrl: Type.Optional(Type.String({ maxLength: MAX_URL_LENGTH })),
    bio: Type.Optional(Type.String({ maxLength: 2000 })),
  },
  { additionalProperties: false }
);

export type UpdateFrogolBody = Static<typeof UpdateFrogolBodySchema>;

export const LinkBodySchema = Type.Object(
  {
    url: Type.String({ minLength: 1, maxLength: MAX_URL_LENGTH }),
    label: Type.String({ minLength: 1, maxLength: 200 }),
  },
  { additionalProperties: false }
);

export type LinkBody = Static<typeof LinkBodySchema>;

export const SetLinkActiveBodySchema = Type.Object(
  { isActive: Type.Boolean() },
  { additionalProperties: false }
);

export type SetLinkActiveBody = Static<typeof SetLinkActiveBodySchema>;

export const ReorderLinksBodySchema = Type.Object(
  {
    ids: Type.Array(Type.String({ minLength: 1, maxLength: 64 }), {
      maxItems: 500,
      description: 'Link ids in the desired order; the first id selects the profile',
    }),
  },
  { additionalProperties: false }
);

export type ReorderLinksBody = Static<typeof ReorderLinksBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────────────────────

const NullableString = Type.Union([Type.String(), Type.Null()]);

export const FrogolSchema = Type.Object({
  id: Type.String(),
  userId: Type.String(),
  slug: Type.String(),
  displayName: NullableString,
  theme: NullableString,
  avatarUrl: NullableString,
  bio: NullableString,
  createdAt: Type.String({ format: 'date-time' }),
});

export const LinkSchema = Type.Object({
  id: Type.String(),
  frogolId: Type.String(),
  url: Type.String(),
  label: Type.String(),
  sortOrder: Type.Integer(),
  isActive: Type.Boolean(),
  kind: Type.String(),
  createdAt: Type.String({ format: 'date-time' }),
});

export const FrogolSummarySchema = Type.Object({
  id: Type.String(),
  slug: Type.String(),
  displayName: Type.String(),
  totalLinks: Type.Integer(),
  totalLeads: Type.Integer(),
  totalClicks: Type.Integer(),
  createdAt: Type.String({ format: 'date-time' }),
});

export const ClickStatsSchema = Type.Object({
  totalClicks: Type.Integer(),
  uniqueClicks: Type.Integer(),
  perLinkClicks: Type.Record(Type.String(), Type.Integer()),
});

export const UserAnalyticsSchema = Type.Object({
  totalFrogols: Type.Integer(),
  totalLinks: Type.Integer(),
  totalLeads: Type.Integer(),
  totalClicks: Type.Integer(),
  topFrogols: Type.Array(FrogolSummarySchema),
});

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

const okResponse = <T extends TProperties>(data: T) =>
  Type.Object({ ok: Type.Literal(true), data: Type.Object(data) });

export const FrogolResponseSchema = okResponse({ frogol: FrogolSchema });

export const FrogolListResponseSchema = okResponse({ frogols: Type.Array(FrogolSummarySchema) });

export const PublicProfileResponseSchema = okResponse({
  frogol: FrogolSchema,
  links: Type.Array(LinkSchema),
});

export const LinkResponseSchema = okResponse({ link: LinkSchema });

export const LinkListResponseSchema = okResponse({ links: Type.Array(LinkSchema) });

export const ReorderLinksResponseSchema = okResponse({ ids: Type.Array(Type.String()) });

export const ClickStatsResponseSchema = okResponse({ stats: ClickStatsSchema });

export const UserAnalyticsResponseSchema = okResponse({ analytics: UserAnalyticsSchema });

export const DeletedResponseSchema = okResponse({ deleted: Type.Boolean() });

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
