import type express from "express";
import { unauthorized } from "./errors.js";

declare module "express-session" {
  interface SessionData {
    userId: string;
    username: string;
  }
}

export function requireAuth(
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
) {
  if (!req.session.userId) {
    res.status(401).json({ error: "Not authenticated" });
    return;
  }
  next();
}

/** Id of the logged-in user; only call behind `requireAuth`. */
export function sessionUserId(req: express.Request): string {
  const userId = req.session.userId;
  if (!userId) throw unauthorized();
  return userId;
}

export interface RateLimitOptions {
  windowMs?: number;
  max?: number;
}

/** Per-IP attempt counter for the auth endpoints. */
export function createRateLimiter({ windowMs = 15 * 60 * 1000, max = 10 }: RateLimitOptions = {}): express.RequestHandler {
  const attempts = new Map<string, { count: number; resetAt: number }>();

  return (req, res, next) => {
    const key = req.ip || "unknown";
    const now = Date.now();
    const entry = attempts.get(key);

    if (entry && now < entry.resetAt) {
      if (entry.count >= max) {
        const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
        res.status(429).json({
          error: "Too many attempts. Please try again later.",
          retryAfterSeconds: retryAfter,
        });
        return;
      }
      entry.count++;
    } else {
      attempts.set(key, { count: 1, resetAt: now + windowMs });
    }

    // Periodically clean up expired entries
    if (attempts.size > 10000) {
      for (const [k, v] of attempts) {
        if (now >= v.resetAt) attempts.delete(k);
      }
    }

    next();
  };
}

/** Guards the admin routes with `X-Admin-Token` when a token is configured. */
export function requireAdminToken(token: string | undefined): express.RequestHandler {
  return (req, res, next) => {
    if (token && req.get("x-admin-token") !== token) {
      res.status(403).json({ error: "Invalid admin token" });
      return;
    }
    next();
  };
}
