export * from './types.js';
export * from './base-agent.js';
export * from './logger.js';
export * from './pool.js';
