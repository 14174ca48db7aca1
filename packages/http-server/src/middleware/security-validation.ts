/**
 * Request shape validation ahead of routing
 *
 * Rejects oversized paths and anything that cannot be an RPC method path
 * or a known utility route before it reaches the method table.
 */

import type { NextFunction, Request, Response } from 'express';

/**
 * Longest accepted request path
 */
const MAX_PATH_LENGTH = 512;

/**
 * `/<package.Service>/<Method>`
 */
const RPC_PATH = /^\/[A-Za-z_][\w]*(\.[A-Za-z_][\w]*)+\/[A-Za-z_]\w*$/;

const SUSPICIOUS_PATTERNS = {
  nullBytes: /\0/,
  repeatedDots: /\.{2,}/,
  encodedTraversal: /%2e%2e|%252e|%c0%ae/i,
};

/**
 * @param utilityPaths - non-RPC paths that are served (e.g. `/health`)
 */
export function createSecurityValidationMiddleware(utilityPaths: readonly string[] = ['/health']) {
  const allowed = new Set(utilityPaths);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path.length > MAX_PATH_LENGTH) {
      res.status(414).json({
        code: 'invalid_argument',
        message: `path exceeds ${MAX_PATH_LENGTH} characters`,
      });
      return;
    }

    for (const [patternName, pattern] of Object.entries(SUSPICIOUS_PATTERNS)) {
      if (pattern.test(req.originalUrl)) {
        res.status(400).json({
          code: 'invalid_argument',
          message: `request contains suspicious pattern: ${patternName}`,
        });
        return;
      }
    }

    if (req.method === 'OPTIONS' || allowed.has(req.path) || RPC_PATH.test(req.path)) {
      next();
      return;
    }

    res.status(404).json({ code: 'not_found', message: `no route for ${req.method} ${req.path}` });
  };
}
