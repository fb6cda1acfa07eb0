/**
 * @resumekit/agents - resume extraction pipeline
 *
 * - profile/ : resume extraction agent, orchestrator, batch runner
 * - shared/  : base agent, logger, worker pool
 */

export * from './shared/index.js';
export * from './profile/index.js';
