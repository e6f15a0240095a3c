import type { RequestHandler, Request, Response, NextFunction } from "express";

interface RateLimiterState {
  timestamps: Map<string, number[]>;
  cleanupInterval: ReturnType<typeof setInterval>;
}

export type RateLimiter = RequestHandler & { shutdown: () => void };

/** Clients are identified by remote address. */
function clientKey(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? "unknown";
}

/**
 * Sliding one-minute window per client. Requests beyond `maxPerMinute`
 * receive 429 with the milliseconds until the oldest request leaves the
 * window.
 */
export function createRateLimiter(maxPerMinute: number): RateLimiter {
  const windowMs = 60_000;
  const state: RateLimiterState = {
    timestamps: new Map(),
    cleanupInterval: setInterval(() => {
      const now = Date.now();
      for (const [client, times] of state.timestamps) {
        const valid = times.filter((t) => now - t < windowMs);
        if (valid.length === 0) {
          state.timestamps.delete(client);
        } else {
          state.timestamps.set(client, valid);
        }
      }
    }, 60_000),
  };
  state.cleanupInterval.unref();

  const handler: RequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction,
  ) => {
    const client = clientKey(req);
    const now = Date.now();
    const times = state.timestamps.get(client) ?? [];
    const validTimes = times.filter((t) => now - t < windowMs);

    if (validTimes.length >= maxPerMinute) {
      const oldestInWindow = validTimes[0] ?? now;
      const retryAfterMs = oldestInWindow + windowMs - now;
      res.status(429).json({ error: "Rate limit exceeded", retryAfterMs });
      return;
    }

    validTimes.push(now);
    state.timestamps.set(client, validTimes);
    next();
  };

  return Object.assign(handler, {
    shutdown: () => {
      clearInterval(state.cleanupInterval);
    },
  });
}
