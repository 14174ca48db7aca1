/**
 * Wire the server from environment configuration
 */

import { EnvironmentConfig } from '@sessiongate/config';
import {
  AuthGate,
  AuthOrchestrator,
  type IdentityRepository,
  MemoryIdentityRepository,
  PolicyEngine,
  ProviderRegistry,
  TokenIssuer,
  UserService
} from '@sessiongate/auth';
import { logger } from '@sessiongate/observability';
import {
  LoginSessionStoreFactory,
  OAuthStateStoreFactory,
  setLogger as setPersistenceLogger
} from '@sessiongate/persistence';
import { RpcHttpServer } from './rpc-http-server.js';

export interface BootstrapOptions {
  /**
   * Identity storage; defaults to an in-memory repository
   */
  identities?: IdentityRepository;
}

export async function createServerFromEnvironment(options: BootstrapOptions = {}): Promise<RpcHttpServer> {
  EnvironmentConfig.setLogger(logger);
  setPersistenceLogger(logger);

  const env = EnvironmentConfig.get();
  EnvironmentConfig.logConfiguration();

  const auth = EnvironmentConfig.getAuthSettings();
  const storage = EnvironmentConfig.getStorageConfig();
  const serverConfig = EnvironmentConfig.getServerConfig();

  const storeOptions = { type: storage.type, redisUrl: storage.redisUrl, keyPrefix: storage.keyPrefix };
  const states = OAuthStateStoreFactory.create(storeOptions);
  const sessions = LoginSessionStoreFactory.create(storeOptions);

  const policy = await PolicyEngine.load({ file: auth.policyFile, failOpen: auth.policyFailOpen });
  const providers = ProviderRegistry.fromEnvironment();
  const issuer = new TokenIssuer(auth.jwtSecret);

  if (!options.identities) {
    logger.warn('Using in-memory identity repository - identities are lost on restart');
  }
  const identities = options.identities ?? new MemoryIdentityRepository();

  const orchestrator = new AuthOrchestrator({
    states,
    sessions,
    issuer,
    providers,
    identities,
    settings: {
      oauthStateTtlSeconds: auth.oauthStateTtlSeconds,
      sessionTtlSeconds: auth.sessionTtlSeconds
    }
  });

  const gate = new AuthGate({ issuer, policy, internalToken: auth.internalToken });

  logger.info('Auth services created', {
    environment: env.NODE_ENV,
    providers: providers.names(),
    policyAvailable: policy.available,
    internalTokenConfigured: Boolean(auth.internalToken)
  });

  return new RpcHttpServer(
    {
      port: serverConfig.port,
      host: serverConfig.host,
      requestTimeoutMs: serverConfig.requestTimeoutMs,
      allowedOrigins: serverConfig.allowedOrigins,
      storage: storage.type ?? (storage.redisUrl ? 'redis' : 'memory')
    },
    {
      orchestrator,
      users: new UserService(identities),
      gate,
      policy,
      providers,
      disposables: [states, sessions]
    }
  );
}
