import { rateLimitKey, resolveFixedWindow, secondsUntil, type RateLimitInfo } from "@saasrelay/shared";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { CacheProvider } from "./cache.js";
import { createCacheProvider } from "./cache-factory.js";

export interface RateLimitProvider {
  readonly name: string;
  checkRateLimit(identifier: string, limit: number, windowSeconds: number): Promise<RateLimitInfo>;
  getRemaining(identifier: string, limit: number, windowSeconds: number): Promise<number>;
  getResetTime(identifier: string, windowSeconds: number): Promise<Date>;
  reset(identifier: string, windowSeconds: number): Promise<boolean>;
  close(): Promise<void>;
}

export interface FixedWindowOptions {
  now?: () => number;
  /** Close the cache together with the limiter. */
  ownsCache?: boolean;
}

/**
 * Fixed-window counter over a cache provider. Each call to `checkRateLimit`
 * counts as a hit; the first hit of a window sets the key's TTL to the window.
 */
export class FixedWindowRateLimiter implements RateLimitProvider {
  readonly name: string;
  private readonly now: () => number;
  private readonly ownsCache: boolean;

  constructor(
    private readonly cache: CacheProvider,
    options: FixedWindowOptions = {},
  ) {
    this.name = cache.name;
    this.now = options.now ?? Date.now;
    this.ownsCache = options.ownsCache ?? false;
  }

  async checkRateLimit(identifier: string, limit: number, windowSeconds: number): Promise<RateLimitInfo> {
    const nowMs = this.now();
    const window = resolveFixedWindow(nowMs, windowSeconds);
    const key = rateLimitKey(identifier, window);

    const count = await this.cache.increment(key, 1);
    if (count === 1) {
      await this.cache.expire(key, windowSeconds);
    }

    const allowed = count <= limit;
    return {
      allowed,
      limit,
      remaining: Math.max(0, limit - count),
      resetAt: new Date(window.endMs),
      retryAfter: allowed ? null : secondsUntil(window.endMs, nowMs),
    };
  }

  async getRemaining(identifier: string, limit: number, windowSeconds: number): Promise<number> {
    const key = rateLimitKey(identifier, resolveFixedWindow(this.now(), windowSeconds));
    const current = Number.parseInt((await this.cache.get(key)) ?? "0", 10);
    return Math.max(0, limit - current);
  }

  async getResetTime(_identifier: string, windowSeconds: number): Promise<Date> {
    return new Date(resolveFixedWindow(this.now(), windowSeconds).endMs);
  }

  async reset(identifier: string, windowSeconds: number): Promise<boolean> {
    const key = rateLimitKey(identifier, resolveFixedWindow(this.now(), windowSeconds));
    return this.cache.delete(key);
  }

  async close(): Promise<void> {
    if (this.ownsCache) {
      await this.cache.close();
    }
  }
}

/** Shares the app cache when both select the same backend. */
export function createRateLimitProvider(
  config: Pick<AppConfig, "cache" | "rateLimit">,
  cache: CacheProvider,
  logger: Logger,
): RateLimitProvider {
  if (config.rateLimit.provider === cache.name) {
    return new FixedWindowRateLimiter(cache);
  }
  return new FixedWindowRateLimiter(createCacheProvider(config.rateLimit.provider, config.cache, logger), {
    ownsCache: true,
  });
}
