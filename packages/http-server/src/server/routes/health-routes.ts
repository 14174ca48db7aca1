/**
 * Health route
 */

import type { Request, Response, Router } from 'express';
import { HEALTH_METHOD, type PolicyEngine, type ProviderRegistry } from '@sessiongate/auth';
import { buildHealthResponse } from '../responses/health-response.js';

export interface HealthRoutesOptions {
  providers: ProviderRegistry;
  policy: PolicyEngine;
  storage: string;
}

/**
 * Setup the health check endpoint (public, never gated)
 */
export function setupHealthRoutes(router: Router, options: HealthRoutesOptions): void {
  const healthHandler = (_req: Request, res: Response) => {
    const health = buildHealthResponse({
      oauthProviders: options.providers.names(),
      policyAvailable: options.policy.available,
      policyFailOpen: options.policy.failsOpen,
      storage: options.storage,
    });

    res.status(health.status === 'healthy' ? 200 : 503).json(health);
  };

  router.get(HEALTH_METHOD, healthHandler);
}
