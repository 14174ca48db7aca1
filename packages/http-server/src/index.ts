/**
 * HTTP transport for the sessiongate RPC services
 * Provides the express server, per-call context, auth gate middleware and routes
 */

// HTTP Server
export { RpcHttpServer, type RpcServerOptions, type RpcServices } from './server/rpc-http-server.js';
export { createServerFromEnvironment, type BootstrapOptions } from './server/bootstrap.js';

// Call context
export * from './server/call-context.js';
export * from './server/client-info.js';
export * from './server/rpc-errors.js';

// Middleware
export * from './middleware/auth-gate-middleware.js';
export * from './middleware/security-validation.js';

// Services
export * from './services/rpc-method.js';
export * from './services/auth-service-methods.js';
export * from './services/user-service-methods.js';

// Routes
export * from './server/routes/health-routes.js';
export * from './server/routes/rpc-routes.js';
export * from './server/responses/health-response.js';
