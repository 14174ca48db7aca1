/**
 * @sessiongate/config
 * Environment configuration for the auth server
 */

export * from './environment.js';
export * from './base-config.js';
export * from './auth-config.js';
export * from './oauth-config.js';
export * from './storage-config.js';
