import type { ExecutionContext } from '@nestjs/common';

/** Route-specific limit; `ttl` is in milliseconds (throttler unit). */
export type RateLimitEntry = { limit: number; ttl: number };

export const RATE_LIMITS_LOCALS_KEY = 'routeRateLimits';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function getEntry(ctx: ExecutionContext, key: string): RateLimitEntry | null {
  try {
    const req: unknown = ctx.switchToHttp().getRequest();
    const app = isObject(req) ? req.app : undefined;
    const locals = isObject(app) ? app.locals : undefined;
    const store = isObject(locals) ? locals[RATE_LIMITS_LOCALS_KEY] : undefined;
    const entry = isObject(store) ? store[key] : undefined;
    if (!isObject(entry)) return null;
    const { limit, ttl } = entry;
    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0) return null;
    if (typeof ttl !== 'number' || !Number.isFinite(ttl) || ttl <= 0) return null;
    return { limit, ttl };
  } catch {
    return null;
  }
}

export function rateLimitLimit(key: string, fallback: number) {
  return (ctx: ExecutionContext) => getEntry(ctx, key)?.limit ?? fallback;
}

export function rateLimitTtl(key: string, fallback: number) {
  return (ctx: ExecutionContext) => getEntry(ctx, key)?.ttl ?? fallback;
}
