/**
 * Health module exports
 */

export { makeHealthRoutes, type MakeHealthRoutesDeps } from './shell/rest/routes.js';

export { makeDbHealthChecker, type DbHealthCheckerOptions } from './shell/checkers/index.js';

export {
  getReadiness,
  determineOverallStatus,
  type GetReadinessDeps,
} from './core/usecases/get-readiness.js';

export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
