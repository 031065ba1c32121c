/**
 * Frogols Module - Domain Types
 *
 * Profiles ("frogols"), their ordered links and click analytics.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Slugs that collide with application routes.
 */
export const RESERVED_SLUGS: ReadonlySet<string> = new Set([
  'login',
  'logout',
  'register',
  'dashboard',
  'api',
  'static',
  'favicon.ico',
]);

/** Kind assigned to links created through the API */
export const DEFAULT_LINK_KIND = 'link';

/** Display name used in summaries when a profile has none */
export const DEFAULT_DISPLAY_NAME = 'Frogol';

/** Number of profiles reported in user analytics */
export const TOP_FROGOLS_LIMIT = 5;

/** Maximum length of a raw slug accepted from clients */
export const MAX_SLUG_INPUT_LENGTH = 200;

/** Maximum URL length accepted for links */
export const MAX_URL_LENGTH = 2048;

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A public link-in-bio profile.
 */
export interface Frogol {
  id: string;
  userId: string;
  slug: string;
  displayName: string | null;
  theme: string | null;
  avatarUrl: string | null;
  bio: string | null;
  createdAt: Date;
}

/**
 * An outbound link on a profile.
 * Active links of a profile are ordered by `sortOrder`, then `id`.
 */
export interface Link {
  id: string;
  frogolId: string;
  url: string;
  label: string;
  sortOrder: number;
  isActive: boolean;
  kind: string;
  createdAt: Date;
}

/**
 * Click totals for a single profile.
 */
export interface ClickStats {
  totalClicks: number;
  /** Distinct non-null visitor IPs */
  uniqueClicks: number;
  /** Every link of the profile, active or not, mapped to its click count */
  perLinkClicks: Record<string, number>;
}

/**
 * Click count for one link, as reported by the store.
 */
export interface LinkClickCount {
  linkId: string;
  count: number;
}

/**
 * Profile listing entry with aggregate counts.
 */
export interface FrogolSummary {
  id: string;
  slug: string;
  displayName: string;
  totalLinks: number;
  totalLeads: number;
  totalClicks: number;
  createdAt: Date;
}

/**
 * Account-wide totals for a user.
 */
export interface UserAnalytics {
  totalFrogols: number;
  totalLinks: number;
  totalLeads: number;
  totalClicks: number;
  /** Up to five profiles, most clicked first, then most leads */
  topFrogols: FrogolSummary[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository Inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface CreateFrogolInput {
  userId: string;
  /** Already normalized */
  slug: string;
  displayName: string | null;
}

export interface UpdateFrogolInput {
  displayName: string;
  theme: string;
  /** Stored value is kept when undefined */
  avatarUrl?: string;
  /** Stored value is kept when undefined */
  bio?: string;
}

export interface CreateLinkInput {
  frogolId: string;
  /** Already normalized */
  url: string;
  label: string;
  sortOrder: number;
}

export interface UpdateLinkInput {
  url: string;
  label: string;
}

export interface RecordClickInput {
  linkId: string;
  ipAddress: string | null;
  userAgent: string | null;
}
