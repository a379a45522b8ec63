import { NextFunction, Request, RequestHandler, Response } from "express";
import { sendError } from "../api/respond";
import { Clock } from "../utils/time";

export type RateLimiter = RequestHandler & { trackedClients(): number };

interface ClientWindow {
  hits: number;
  resetAt: number;
}

/**
 * Fixed-window limit per client address. Expired windows are dropped as
 * requests arrive, so the table only holds clients seen in the last window.
 */
export function createRateLimiter(windowMs: number, maxHits: number, clock: Clock): RateLimiter {
  const windows = new Map<string, ClientWindow>();

  function prune(now: number): void {
    for (const [client, window] of windows) {
      if (window.resetAt <= now) {
        windows.delete(client);
      }
    }
  }

  const limiter = (req: Request, res: Response, next: NextFunction): void => {
    const now = clock.now().getTime();
    prune(now);

    const client = req.ip || req.socket.remoteAddress || "unknown";
    const current = windows.get(client);
    if (!current) {
      windows.set(client, { hits: 1, resetAt: now + windowMs });
      next();
      return;
    }

    if (current.hits >= maxHits) {
      res.setHeader("Retry-After", Math.ceil((current.resetAt - now) / 1000).toString());
      sendError(res, 429, "RateLimited", "Too many requests. Please try again later.");
      return;
    }

    current.hits += 1;
    next();
  };

  return Object.assign(limiter, { trackedClients: (): number => windows.size });
}
