/**
 * Fixed-window, in-memory rate limiting per client address
 */

import type { NextFunction, Request, Response } from "express";
import { ProtocolError, toErrorPayload } from "../../core/errors";

interface WindowEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetTime: number;
}

export interface RateLimiterOptions {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

export class RateLimiter {
  private readonly store = new Map<string, WindowEntry>();
  readonly windowMs: number;
  readonly maxRequests: number;
  private readonly now: () => number;
  private cleanupTimer?: NodeJS.Timeout;

  constructor(options: RateLimiterOptions) {
    this.windowMs = options.windowMs;
    this.maxRequests = options.maxRequests;
    this.now = options.now ?? Date.now;
  }

  check(identifier: string): RateLimitDecision {
    const now = this.now();
    const entry = this.store.get(identifier);

    if (!entry || now >= entry.resetTime) {
      const resetTime = now + this.windowMs;
      this.store.set(identifier, { count: 1, resetTime });
      return { allowed: true, remaining: this.maxRequests - 1, resetTime };
    }

    if (entry.count >= this.maxRequests) {
      return { allowed: false, remaining: 0, resetTime: entry.resetTime };
    }

    entry.count++;
    return { allowed: true, remaining: this.maxRequests - entry.count, resetTime: entry.resetTime };
  }

  cleanup(): void {
    const now = this.now();
    for (const [key, entry] of this.store) {
      if (entry.resetTime <= now) this.store.delete(key);
    }
  }

  /**
   * Periodic cleanup. The timer does not keep the process alive.
   */
  start(intervalMs: number = this.windowMs): void {
    this.stop();
    this.cleanupTimer = setInterval(() => this.cleanup(), intervalMs);
    this.cleanupTimer.unref();
  }

  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  get trackedClients(): number {
    return this.store.size;
  }
}

export function clientIdentifier(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown";
}

export function rateLimit(limiter: RateLimiter) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = limiter.check(clientIdentifier(req));

    res.setHeader("X-RateLimit-Limit", limiter.maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader("X-RateLimit-Reset", new Date(result.resetTime).toISOString());

    if (!result.allowed) {
      const error = new ProtocolError("Rate limit exceeded. Please try again later.", "RATE_LIMITED", {
        resetTime: result.resetTime,
      });
      res.status(error.statusCode).json({ ok: false, error: toErrorPayload(error) });
      return;
    }
    next();
  };
}
