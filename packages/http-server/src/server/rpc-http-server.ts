/**
 * HTTP server exposing the auth and user RPC services
 */

import { randomUUID } from 'node:crypto';
import { createServer, type Server as HttpServer } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import {
  type AuthGate,
  type AuthOrchestrator,
  InvalidArgumentError,
  type PolicyEngine,
  type ProviderRegistry,
  type UserService,
  toRpcError
} from '@sessiongate/auth';
import { logger } from '@sessiongate/observability';
import { createSecurityValidationMiddleware } from '../middleware/security-validation.js';
import { TOKEN_TYPE_HEADER } from '../middleware/auth-gate-middleware.js';
import { createAuthServiceMethods } from '../services/auth-service-methods.js';
import { createUserServiceMethods } from '../services/user-service-methods.js';
import { mergeMethodTables } from '../services/rpc-method.js';
import { REQUEST_TIMEOUT_HEADER } from './call-context.js';
import { sendRpcError } from './rpc-errors.js';
import { setupHealthRoutes } from './routes/health-routes.js';
import { setupRpcRoutes } from './routes/rpc-routes.js';

export interface RpcServerOptions {
  port: number;
  host: string;
  /**
   * Upper bound for a call; clients may ask for less via x-request-timeout-ms
   */
  requestTimeoutMs: number;
  allowedOrigins?: string[];
  /**
   * Storage backend name reported by /health
   */
  storage?: string;
}

export interface RpcServices {
  orchestrator: AuthOrchestrator;
  users: UserService;
  gate: AuthGate;
  policy: PolicyEngine;
  providers: ProviderRegistry;
  /**
   * Resources released when the server stops (stores)
   */
  disposables?: Array<{ dispose(): Promise<void> }>;
}

/**
 * body-parser failures carry a `type` such as `entity.parse.failed`
 */
function bodyParserFailure(error: unknown): InvalidArgumentError | null {
  if (!(error instanceof Error) || !('type' in error) || typeof error.type !== 'string') {
    return null;
  }
  if (error.type === 'entity.parse.failed') {
    return new InvalidArgumentError('request body is not valid JSON', { cause: error });
  }
  if (error.type.startsWith('entity.')) {
    return new InvalidArgumentError('malformed request body', { cause: error });
  }
  return null;
}

export class RpcHttpServer {
  private app: Express;
  private server?: HttpServer;

  constructor(
    private readonly options: RpcServerOptions,
    private readonly services: RpcServices
  ) {
    this.app = express();
    this.app.disable('x-powered-by');
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Set up Express middleware for security and functionality
   */
  private setupMiddleware(): void {
    this.app.use(helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
      strictTransportSecurity: false, // no TLS termination here
    }));

    const defaultOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'];
    const corsOptions: cors.CorsOptions = {
      origin: (origin, callback) => {
        // Same-origin requests and non-browser clients send no Origin
        if (!origin) {
          return callback(null, true);
        }
        const allowedOrigins = this.options.allowedOrigins || defaultOrigins;
        return callback(null, allowedOrigins.includes(origin));
      },
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: [
        'Content-Type',
        'Authorization',
        TOKEN_TYPE_HEADER,
        REQUEST_TIMEOUT_HEADER,
      ],
      optionsSuccessStatus: 200,
    };
    this.app.use(cors(corsOptions));

    this.app.use(createSecurityValidationMiddleware());
    this.app.use(express.json({ limit: '64kb' }));

    // Request logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const requestId = randomUUID();
      const startTime = Date.now();
      req.requestId = requestId;

      res.on('finish', () => {
        logger.info('HTTP request completed', {
          requestId,
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startTime,
          ip: req.ip,
        });
      });

      next();
    });
  }

  /**
   * Set up health and RPC routes plus the error handler
   */
  private setupRoutes(): void {
    const router = express.Router();

    setupHealthRoutes(router, {
      providers: this.services.providers,
      policy: this.services.policy,
      storage: this.options.storage ?? 'memory',
    });

    setupRpcRoutes(router, {
      methods: mergeMethodTables(
        createAuthServiceMethods(this.services.orchestrator),
        createUserServiceMethods(this.services.users)
      ),
      gate: this.services.gate,
      maxTimeoutMs: this.options.requestTimeoutMs,
    });

    this.app.use(router);

    // Every failure leaves as { code, message }
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const rpcError = bodyParserFailure(error) ?? toRpcError(error);

      if (rpcError.code === 'internal') {
        logger.error('RPC call failed with internal error', {
          requestId: req.requestId,
          path: req.path,
          error: rpcError.cause instanceof Error ? rpcError.cause.message : rpcError.message,
        });
      }

      sendRpcError(res, rpcError);
    });
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer(this.app);

      this.server.on('error', (error: Error) => {
        logger.error('HTTP server error', error);
        reject(error);
      });

      this.server.listen(this.options.port, this.options.host, () => {
        logger.info('RPC server listening', {
          host: this.options.host,
          port: this.options.port,
        });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server and release the stores
   */
  async stop(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close((error?: Error) => {
        if (error) {
          reject(error);
        } else {
          logger.info('RPC server stopped');
          resolve();
        }
      });
    });

    for (const disposable of this.services.disposables ?? []) {
      await disposable.dispose();
    }
  }

  /**
   * Get the Express app for testing or customization
   */
  getApp(): Express {
    return this.app;
  }
}
