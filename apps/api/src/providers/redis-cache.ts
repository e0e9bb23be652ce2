import { createClient } from "redis";
import type { Logger } from "../logger.js";
import { BaseCacheProvider, DEFAULT_CACHE_TTL_SECONDS } from "./cache.js";

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisClient(url: string, logger: Logger): RedisClient {
  const client = createClient({
    url,
    socket: {
      reconnectStrategy: (retries) => {
        if (retries > 10) {
          logger.error("Redis: max reconnection attempts reached");
          return new Error("Max reconnection attempts reached");
        }
        return Math.min(retries * 100, 3000);
      },
    },
  });

  client.on("error", (error: unknown) => {
    logger.error({ err: error }, "Redis client error");
  });
  client.on("ready", () => {
    logger.info("Redis client ready");
  });

  return client;
}

/** Cache over a node-redis client. Connects on first use. */
export class RedisCacheProvider extends BaseCacheProvider {
  readonly name = "redis";
  private readonly client: RedisClient;
  private readonly logger: Logger;
  private connecting: Promise<unknown> | null = null;

  constructor(url: string, logger: Logger) {
    super();
    this.logger = logger.child({ component: "redis-cache" });
    this.client = createRedisClient(url, this.logger);
  }

  private async ready(): Promise<RedisClient> {
    if (!this.client.isOpen) {
      if (!this.connecting) {
        this.connecting = this.client.connect().finally(() => {
          this.connecting = null;
        });
      }
      await this.connecting;
    }
    return this.client;
  }

  async get(key: string): Promise<string | null> {
    const client = await this.ready();
    return client.get(key);
  }

  async set(key: string, value: string, ttlSeconds = DEFAULT_CACHE_TTL_SECONDS): Promise<boolean> {
    const client = await this.ready();
    const result = ttlSeconds > 0 ? await client.set(key, value, { EX: ttlSeconds }) : await client.set(key, value);
    return result === "OK";
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const client = await this.ready();
    const result = await client.set(key, value, { EX: ttlSeconds, NX: true });
    return result === "OK";
  }

  async delete(key: string): Promise<boolean> {
    const client = await this.ready();
    return (await client.del(key)) > 0;
  }

  async exists(key: string): Promise<boolean> {
    const client = await this.ready();
    return (await client.exists(key)) > 0;
  }

  async increment(key: string, by = 1): Promise<number> {
    const client = await this.ready();
    return client.incrBy(key, by);
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    const client = await this.ready();
    return client.expire(key, seconds);
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
      this.logger.info("Redis connection closed");
    }
  }
}
