import type { HealthCheckResult } from './types.js';

/**
 * Checks one dependency. Should resolve with an unhealthy result instead of rejecting;
 * a rejection is still reported as a critical failure.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;
