/**
 * @sessiongate/auth
 *
 * Authentication and authorization for sessiongate RPC services: OAuth and
 * password login, session-bound tokens, and the per-call RBAC gate.
 */

export * from './roles.js';
export * from './errors.js';
export * from './password.js';
export * from './token-issuer.js';
export * from './policy-engine.js';
export * from './auth-gate.js';
export * from './auth-orchestrator.js';
export * from './user-service.js';

export * from './identity/identity-repository.js';
export * from './identity/memory-identity-repository.js';

export * from './providers/types.js';
export { BaseOAuthProvider } from './providers/base-provider.js';
export { GitHubOAuthProvider } from './providers/github-provider.js';
export { GoogleOAuthProvider } from './providers/google-provider.js';
export * from './providers/registry.js';
