/**
 * Frogols Module - Port Interfaces
 *
 * Store contracts that the shell layer must implement.
 */

import type { FrogolError } from './errors.js';
import type {
  CreateFrogolInput,
  CreateLinkInput,
  Frogol,
  FrogolSummary,
  Link,
  LinkClickCount,
  RecordClickInput,
  UpdateFrogolInput,
  UpdateLinkInput,
  UserAnalytics,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Frogol Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface FrogolRepository {
  /**
   * Inserts a profile.
   * A uniqueness violation on `slug` is reported as SlugTakenError.
   */
  create(input: CreateFrogolInput): Promise<Result<Frogol, FrogolError>>;

  /** @returns The profile, or null if no profile has this slug */
  getBySlug(slug: string): Promise<Result<Frogol | null, FrogolError>>;

  /** @returns The profile, or null if not found */
  getById(id: string): Promise<Result<Frogol | null, FrogolError>>;

  /**
   * Lists a user's profiles with link, lead and click counts, newest first.
   */
  listSummariesForUser(userId: string): Promise<Result<FrogolSummary[], FrogolError>>;

  /**
   * Updates display fields. Undefined `avatarUrl`/`bio` keep the stored values.
   * @returns The updated profile, or null if not found
   */
  update(id: string, input: UpdateFrogolInput): Promise<Result<Frogol | null, FrogolError>>;

  /** @returns The updated profile, or null if not found */
  setAvatarUrl(id: string, avatarUrl: string | null): Promise<Result<Frogol | null, FrogolError>>;

  /**
   * Deletes a profile. Links, leads, clicks and avatar records cascade.
   * @returns false if nothing was deleted
   */
  delete(id: string): Promise<Result<boolean, FrogolError>>;

  getUserAnalytics(userId: string): Promise<Result<UserAnalytics, FrogolError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Link Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface LinkRepository {
  /** Inserts an active link of the default kind. */
  create(input: CreateLinkInput): Promise<Result<Link, FrogolError>>;

  /** @returns One past the highest sort order of the profile, 0 when it has no links */
  nextSortOrder(frogolId: string): Promise<Result<number, FrogolError>>;

  /** Active links ordered by `sort_order, id`. */
  listActive(frogolId: string): Promise<Result<Link[], FrogolError>>;

  /** All links ordered by `sort_order, id`. */
  listAll(frogolId: string): Promise<Result<Link[], FrogolError>>;

  getById(id: string): Promise<Result<Link | null, FrogolError>>;

  update(id: string, input: UpdateLinkInput): Promise<Result<Link | null, FrogolError>>;

  setActive(id: string, isActive: boolean): Promise<Result<Link | null, FrogolError>>;

  /** @returns false if nothing was deleted */
  delete(id: string): Promise<Result<boolean, FrogolError>>;

  /**
   * Sets `sort_order = index` for every id, scoped to the profile.
   * All rows are updated in one transaction, or none are.
   */
  reassignSortOrders(
    frogolId: string,
    orderedIds: readonly string[]
  ): Promise<Result<void, FrogolError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Click Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface ClickRepository {
  /** Appends a click event. */
  record(input: RecordClickInput): Promise<Result<void, FrogolError>>;

  /** Clicks on any link of the profile. */
  countClicks(frogolId: string): Promise<Result<number, FrogolError>>;

  /** Distinct non-null IP addresses among the profile's clicks. */
  countUniqueIps(frogolId: string): Promise<Result<number, FrogolError>>;

  /** One entry per link of the profile, including links without clicks. */
  clicksPerLink(frogolId: string): Promise<Result<LinkClickCount[], FrogolError>>;
}
