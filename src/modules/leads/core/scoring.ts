/**
 * Lead scoring by acquisition source.
 */

const SOURCE_SCORES: ReadonlyMap<string, number> = new Map([
  ['direct', 100],
  ['referral', 90],
  ['social', 80],
]);

/** Score for unknown or missing sources */
export const DEFAULT_LEAD_SCORE = 70;

/**
 * Scores a lead by where the visitor came from.
 *
 * @example
 * scoreForSource('social');   // 80
 * scoreForSource(undefined);  // 70
 */
export const scoreForSource = (source?: string | null): number => {
  if (source === undefined || source === null) {
    return DEFAULT_LEAD_SCORE;
  }
  return SOURCE_SCORES.get(source) ?? DEFAULT_LEAD_SCORE;
};

/**
 * Minimal email check: anything containing an `@`.
 */
export const isPlausibleEmail = (email: string): boolean => email.includes('@');
