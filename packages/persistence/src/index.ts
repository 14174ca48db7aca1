/**
 * @sessiongate/persistence
 *
 * Storage for short-lived authentication state: pending OAuth authorizations
 * and login sessions, with memory and Redis backends.
 *
 * ```typescript
 * import { OAuthStateStoreFactory, LoginSessionStoreFactory, setLogger } from '@sessiongate/persistence';
 *
 * setLogger(myLogger);
 * const states = OAuthStateStoreFactory.create();
 * const sessions = LoginSessionStoreFactory.create({ keyPrefix: 'prod' });
 * ```
 */

export * from './types.js';
export * from './errors.js';

export * from './interfaces/oauth-state-store.js';
export * from './interfaces/login-session-store.js';

export * from './factories/oauth-state-store-factory.js';
export * from './factories/login-session-store-factory.js';

export * from './stores/memory/memory-oauth-state-store.js';
export * from './stores/memory/memory-login-session-store.js';
export * from './stores/redis/redis-oauth-state-store.js';
export * from './stores/redis/redis-login-session-store.js';
export { maskRedisUrl, normalizeKeyPrefix } from './stores/redis/redis-utils.js';

export * from './logger.js';
