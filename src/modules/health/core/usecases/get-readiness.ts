import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const toCheckResult = (
  result: PromiseSettledResult<HealthCheckResult>,
  index: number
): HealthCheckResult => {
  if (result.status === 'fulfilled') {
    return result.value;
  }
  return {
    name: `check-${String(index)}`,
    status: 'unhealthy',
    message: result.reason instanceof Error ? result.reason.message : 'Check failed',
    critical: true,
  };
};

/**
 * - Any critical check unhealthy → "unhealthy"
 * - Only non-critical checks unhealthy → "degraded"
 * - Otherwise → "ok"
 *
 * Checks without a `critical` flag count as critical.
 */
export const determineOverallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failing = checks.filter((check) => check.status === 'unhealthy');

  if (failing.some((check) => check.critical !== false)) {
    return 'unhealthy';
  }
  return failing.length > 0 ? 'degraded' : 'ok';
};

/**
 * Runs all checkers in parallel and aggregates their results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const settled = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
