/**
 * Health check response builder
 */

export interface HealthResponseOptions {
  oauthProviders: string[];
  policyAvailable: boolean;
  policyFailOpen: boolean;
  storage: string;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  node_version: string;
  environment: string;
  oauth_providers: string[];
  policy: 'loaded' | 'unavailable' | 'fail_open';
  storage: string;
  performance: {
    uptime_seconds: number;
    memory_usage: NodeJS.MemoryUsage;
  };
}

/**
 * The server is degraded while the policy table is unavailable: protected
 * calls are refused (or, with fail-open, admitted without a check).
 */
export function buildHealthResponse(options: HealthResponseOptions): HealthResponse {
  let policy: HealthResponse['policy'] = 'loaded';
  if (!options.policyAvailable) {
    policy = options.policyFailOpen ? 'fail_open' : 'unavailable';
  }

  return {
    status: options.policyAvailable ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || '0.1.0',
    node_version: process.version,
    environment: process.env.NODE_ENV || 'development',
    oauth_providers: options.oauthProviders,
    policy,
    storage: options.storage,
    performance: {
      uptime_seconds: process.uptime(),
      memory_usage: process.memoryUsage(),
    },
  };
}
