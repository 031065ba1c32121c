/**
 * Frogols Module - Public API
 *
 * Link-in-bio profiles, their ordered links and click tracking.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Frogol,
  Link,
  ClickStats,
  LinkClickCount,
  FrogolSummary,
  UserAnalytics,
  CreateFrogolInput,
  UpdateFrogolInput,
  CreateLinkInput,
  UpdateLinkInput,
  RecordClickInput,
} from './core/types.js';

export {
  RESERVED_SLUGS,
  DEFAULT_LINK_KIND,
  DEFAULT_DISPLAY_NAME,
  TOP_FROGOLS_LIMIT,
  MAX_SLUG_INPUT_LENGTH,
  MAX_URL_LENGTH,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  FrogolError,
  DatabaseError,
  InvalidInputError,
  SlugTakenError,
  FrogolNotFoundError,
  LinkNotFoundError,
} from './core/errors.js';

export {
  createDatabaseError,
  createInvalidInputError,
  createSlugTakenError,
  createFrogolNotFoundError,
  createLinkNotFoundError,
  FROGOL_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports & Pure Logic
// ─────────────────────────────────────────────────────────────────────────────

export type { FrogolRepository, LinkRepository, ClickRepository } from './core/ports.js';

export { normalizeSlug } from './core/slug.js';
export { normalizeUrl } from './core/url.js';
export { resolveLinkOrder } from './core/link-order.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { createFrogol, type CreateFrogolDeps } from './core/usecases/create-frogol.js';
export {
  getFrogolBySlug,
  getFrogolById,
  getOwnedFrogol,
  type GetFrogolDeps,
} from './core/usecases/get-frogol.js';
export {
  getPublicProfile,
  type GetPublicProfileDeps,
  type PublicProfile,
} from './core/usecases/get-public-profile.js';
export { updateFrogol, type UpdateFrogolDeps } from './core/usecases/update-frogol.js';
export { deleteFrogol, type DeleteFrogolDeps } from './core/usecases/delete-frogol.js';
export { listUserFrogols, type ListUserFrogolsDeps } from './core/usecases/list-user-frogols.js';
export { getUserAnalytics, type GetUserAnalyticsDeps } from './core/usecases/get-user-analytics.js';
export { addLink, type AddLinkDeps, type AddLinkInput } from './core/usecases/add-link.js';
export {
  getLink,
  getOwnedLink,
  listLinks,
  updateLink,
  setLinkActive,
  deleteLink,
  type LinkDeps,
  type OwnedLinkDeps,
} from './core/usecases/manage-links.js';
export {
  reorderLinks,
  type ReorderLinksDeps,
  type ReorderLinksInput,
  type ReorderLinksResult,
} from './core/usecases/reorder-links.js';
export {
  getClickStats,
  toPerLinkClicks,
  type GetClickStatsDeps,
} from './core/usecases/get-click-stats.js';
export {
  trackClick,
  type TrackClickDeps,
  type TrackClickInput,
} from './core/usecases/track-click.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository Implementations
// ─────────────────────────────────────────────────────────────────────────────

export { makeFrogolRepo, type FrogolRepoOptions } from './shell/repo/frogol-repo.js';
export { makeLinkRepo, type LinkRepoOptions } from './shell/repo/link-repo.js';
export { makeClickRepo, type ClickRepoOptions } from './shell/repo/click-repo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeFrogolRoutes,
  toFrogolDto,
  toLinkDto,
  type MakeFrogolRoutesDeps,
} from './shell/rest/routes.js';
