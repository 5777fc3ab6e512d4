/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';
export type { HealthDeps, LivenessResponse } from './core/types.js';
