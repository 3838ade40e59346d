// Best-effort in-memory cache + rate limiting for the generate route.
// State lives per warm serverless instance and is not shared across instances.

import { createHash } from "crypto";

export const CACHE_TTL_MS = 15 * 60 * 1000; // 15 minutes
export const RATE_WINDOW_MS = 60 * 1000; // 60 seconds
export const RATE_LIMIT = 30; // requests per IP per window

type CacheEntry<T> = { expiresAt: number; value: T };

export function sha256(s: string) {
  return createHash("sha256").update(s).digest("hex");
}

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(private readonly ttlMs: number = CACHE_TTL_MS, private readonly now: () => number = Date.now) {}

  get(key: string): T | null {
    const hit = this.entries.get(key);
    if (!hit) return null;
    if (this.now() > hit.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return hit.value;
  }

  set(key: string, value: T) {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }
}

export type RateDecision = {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch seconds at which the window resets. */
  resetAt: number;
  retryAfterSeconds?: number;
};

export class RateLimiter {
  private readonly windows = new Map<string, { resetAt: number; count: number }>();

  constructor(
    private readonly limit: number = RATE_LIMIT,
    private readonly windowMs: number = RATE_WINDOW_MS,
    private readonly now: () => number = Date.now
  ) {}

  check(clientId: string): RateDecision {
    const now = this.now();
    const cur = this.windows.get(clientId);

    if (!cur || now > cur.resetAt) {
      const resetAt = now + this.windowMs;
      this.windows.set(clientId, { resetAt, count: 1 });
      return { allowed: true, limit: this.limit, remaining: this.limit - 1, resetAt: Math.ceil(resetAt / 1000) };
    }

    if (cur.count >= this.limit) {
      return {
        allowed: false,
        limit: this.limit,
        remaining: 0,
        resetAt: Math.ceil(cur.resetAt / 1000),
        retryAfterSeconds: Math.max(1, Math.ceil((cur.resetAt - now) / 1000)),
      };
    }

    cur.count += 1;
    return {
      allowed: true,
      limit: this.limit,
      remaining: Math.max(0, this.limit - cur.count),
      resetAt: Math.ceil(cur.resetAt / 1000),
    };
  }
}

export function clientIpFrom(headers: Record<string, string | string[] | undefined>, remoteAddress?: string): string {
  const xf = headers["x-forwarded-for"];
  if (typeof xf === "string" && xf.length > 0) return xf.split(",")[0].trim();
  const real = headers["x-real-ip"];
  if (typeof real === "string" && real.length > 0) return real.trim();
  return remoteAddress || "unknown";
}
