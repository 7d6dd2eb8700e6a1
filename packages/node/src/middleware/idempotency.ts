/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key header, scoped to
 * the authenticated shop. If the same shop sends the same key again within
 * the TTL, the cached response is replayed instead of posting twice.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
  /** Timestamp written as `cachedAt` */
  now(): number;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get ttlMs(): number {
    return this._ttlMs;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this._cache.set(key, response);
  }

  now(): number {
    return this._now();
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";

/** Cache key for a client key within one shop. */
export function scopedKey(shopId: string, key: string): string {
  return `${shopId}\u0000${key}`;
}

/**
 * Must run AFTER auth middleware.
 */
export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const header = c.req.header(IDEMPOTENCY_HEADER);
    if (header === undefined) {
      return next();
    }
    const idempotencyKey = scopedKey(c.get("auth").shopId, header);

    const cached = store.get(idempotencyKey);
    if (cached !== undefined) {
      return new Response(cached.body, {
        status: cached.status,
        headers: { ...cached.headers, "X-Idempotent-Replay": "true" },
      });
    }

    await next();

    if (c.res.status < 400) {
      const clonedRes = c.res.clone();
      const body = await clonedRes.text();
      const headers: Record<string, string> = {};
      clonedRes.headers.forEach((value, key) => {
        headers[key] = value;
      });

      store.set(idempotencyKey, {
        status: clonedRes.status,
        body,
        headers,
        cachedAt: store.now(),
      });
    }
  };
}
