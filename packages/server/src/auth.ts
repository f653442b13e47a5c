// =============================================================================
// @feedsieve/server: Bearer-key authentication + per-client rate limiting
// =============================================================================
// API_KEYS maps each key to a client id. The rate limiter keeps a sliding
// one-minute window of request timestamps per client.
// =============================================================================

import type { RequestHandler, Request, Response, NextFunction } from "express";

// Module augmentation: attach clientId to Express requests
declare global {
  namespace Express {
    interface Request {
      clientId?: string;
    }
  }
}

const BEARER = /^Bearer\s+(\S+)$/i;

export function createAuthMiddleware(
  apiKeys: Record<string, string>,
): RequestHandler {
  // Map lookups never fall through to Object.prototype members
  const clients = new Map(Object.entries(apiKeys));

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path === "/health") {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.status(401).json({ error: "Missing Authorization header" });
      return;
    }

    const key = BEARER.exec(authHeader.trim())?.[1];
    if (key === undefined) {
      res.status(401).json({
        error: "Invalid Authorization format. Expected: Bearer <key>",
      });
      return;
    }

    const clientId = clients.get(key);
    if (!clientId) {
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    req.clientId = clientId;
    next();
  };
}

export type RateLimiter = RequestHandler & { shutdown: () => void };

export function createRateLimiter(
  maxPerMinute: number,
  now: () => number = Date.now,
): RateLimiter {
  const windowMs = 60_000;
  const timestamps = new Map<string, number[]>();

  const cleanupInterval = setInterval(() => {
    const cutoff = now() - windowMs;
    for (const [clientId, times] of timestamps) {
      const valid = times.filter((t) => t > cutoff);
      if (valid.length === 0) timestamps.delete(clientId);
      else timestamps.set(clientId, valid);
    }
  }, windowMs);
  cleanupInterval.unref();

  const handler: RequestHandler = (req, res, next) => {
    const clientId = req.clientId;
    if (!clientId) {
      next();
      return;
    }

    const current = now();
    const valid = (timestamps.get(clientId) ?? []).filter(
      (t) => current - t < windowMs,
    );

    const oldest = valid[0];
    if (oldest !== undefined && valid.length >= maxPerMinute) {
      const retryAfterMs = oldest + windowMs - current;
      res.setHeader("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json({ error: "Rate limit exceeded", retryAfterMs });
      return;
    }

    valid.push(current);
    timestamps.set(clientId, valid);
    next();
  };

  return Object.assign(handler, {
    shutdown: () => clearInterval(cleanupInterval),
  });
}
