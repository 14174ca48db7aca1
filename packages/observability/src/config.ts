/**
 * Observability configuration with environment detection
 */

export interface ObservabilityConfig {
  environment: 'development' | 'production' | 'test';
  level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
    version: string;
    namespace?: string;
  };
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test') {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

function detectLevel(environment: ObservabilityConfig['environment']): ObservabilityConfig['level'] {
  switch (process.env.LOG_LEVEL) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return process.env.LOG_LEVEL;
    default:
      return environment === 'development' ? 'debug' : 'info';
  }
}

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();

  return {
    environment,
    level: detectLevel(environment),
    exporters: {
      // Pretty console output is for local development only
      console: environment === 'development',
    },
    service: {
      name: process.env.OTEL_SERVICE_NAME ?? 'sessiongate',
      version: process.env.npm_package_version ?? '0.1.0',
      namespace: environment === 'production' ? 'prod' : 'dev'
    },
  };
}
