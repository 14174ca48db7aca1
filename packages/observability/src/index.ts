/**
 * @sessiongate/observability
 * Structured logging shared by every package of the auth server
 */

export * from './logger.js';
export * from './config.js';
