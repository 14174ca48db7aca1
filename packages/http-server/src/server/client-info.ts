/**
 * Caller details the transport can observe
 */

import type { Request } from 'express';

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function extractUserAgent(req: Request): string | undefined {
  return firstHeader(req.headers['user-agent']);
}

/**
 * Client IP: first X-Forwarded-For hop, then X-Real-IP, then the socket peer
 */
export function extractIpAddress(req: Request): string | undefined {
  const forwarded = firstHeader(req.headers['x-forwarded-for']);
  if (forwarded) {
    const [first] = forwarded.split(',');
    const hop = first.trim();
    if (hop) {
      return hop;
    }
  }

  const realIp = firstHeader(req.headers['x-real-ip']);
  if (realIp) {
    return realIp;
  }

  return req.socket.remoteAddress || undefined;
}
