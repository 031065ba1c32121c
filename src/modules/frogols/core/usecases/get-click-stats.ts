/**
 * Get Click Stats Use Case
 *
 * Aggregates a profile's click events into totals and per-link counts.
 */

import { ok, err, type Result } from 'neverthrow';

import type { FrogolError } from '../errors.js';
import type { ClickRepository } from '../ports.js';
import type { ClickStats, LinkClickCount } from '../types.js';

export interface GetClickStatsDeps {
  clickRepo: ClickRepository;
}

/**
 * Builds the per-link map. Links reported without a count stay at 0.
 */
export const toPerLinkClicks = (counts: readonly LinkClickCount[]): Record<string, number> => {
  const perLink: Record<string, number> = {};
  for (const { linkId, count } of counts) {
    perLink[linkId] = (perLink[linkId] ?? 0) + count;
  }
  return perLink;
};

export const getClickStats = async (
  deps: GetClickStatsDeps,
  input: { frogolId: string }
): Promise<Result<ClickStats, FrogolError>> => {
  const { clickRepo } = deps;
  const { frogolId } = input;

  const [totalResult, uniqueResult, perLinkResult] = await Promise.all([
    clickRepo.countClicks(frogolId),
    clickRepo.countUniqueIps(frogolId),
    clickRepo.clicksPerLink(frogolId),
  ]);

  if (totalResult.isErr()) {
    return err(totalResult.error);
  }
  if (uniqueResult.isErr()) {
    return err(uniqueResult.error);
  }
  if (perLinkResult.isErr()) {
    return err(perLinkResult.error);
  }

  return ok({
    totalClicks: totalResult.value,
    uniqueClicks: uniqueResult.value,
    perLinkClicks: toPerLinkClicks(perLinkResult.value),
  });
};
