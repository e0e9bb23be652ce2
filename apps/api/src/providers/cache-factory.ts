import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { MemoryCacheProvider, type CacheProvider } from "./cache.js";
import { RedisCacheProvider } from "./redis-cache.js";
import { UpstashCacheProvider, createUpstashClient } from "./upstash-cache.js";

export function createCacheProvider(
  provider: AppConfig["cache"]["provider"],
  cache: AppConfig["cache"],
  logger: Logger,
): CacheProvider {
  switch (provider) {
    case "memory":
      return new MemoryCacheProvider();
    case "redis":
      return new RedisCacheProvider(cache.redisUrl, logger);
    case "upstash":
      if (!cache.upstashUrl || !cache.upstashToken) {
        throw new Error("UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN are required for the upstash cache provider");
      }
      return new UpstashCacheProvider(createUpstashClient({ url: cache.upstashUrl, token: cache.upstashToken }), logger);
    default:
      throw new Error(`Unknown cache provider: ${String(provider)}`);
  }
}
