import { Redis } from "@upstash/redis";
import type { Logger } from "../logger.js";
import { BaseCacheProvider, DEFAULT_CACHE_TTL_SECONDS } from "./cache.js";

export interface UpstashOptions {
  url: string;
  token: string;
}

export type UpstashSetOptions = NonNullable<Parameters<Redis["set"]>[2]>;

/** The commands this provider sends; an `@upstash/redis` client satisfies it. */
export interface UpstashClient {
  get(key: string): Promise<unknown>;
  set(key: string, value: string, options?: UpstashSetOptions): Promise<unknown>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<number>;
  incrby(key: string, increment: number): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
}

/** Values stay strings; JSON decoding is left to the cache helpers. */
export function createUpstashClient(options: UpstashOptions): UpstashClient {
  return new Redis({ url: options.url, token: options.token, automaticDeserialization: false });
}

export class UpstashCacheProvider extends BaseCacheProvider {
  readonly name = "upstash";
  private readonly logger: Logger;

  constructor(
    private readonly client: UpstashClient,
    logger: Logger,
  ) {
    super();
    this.logger = logger.child({ component: "upstash-cache" });
  }

  private async run<T>(command: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error({ command, reason }, "Upstash command failed");
      throw new Error(`Upstash ${command} failed: ${reason}`);
    }
  }

  async get(key: string): Promise<string | null> {
    const result = await this.run("GET", () => this.client.get(key));
    return typeof result === "string" ? result : null;
  }

  async set(key: string, value: string, ttlSeconds = DEFAULT_CACHE_TTL_SECONDS): Promise<boolean> {
    const result = await this.run("SET", () =>
      ttlSeconds > 0 ? this.client.set(key, value, { ex: ttlSeconds }) : this.client.set(key, value),
    );
    return result === "OK";
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.run("SET", () => this.client.set(key, value, { ex: ttlSeconds, nx: true }));
    return result === "OK";
  }

  async delete(key: string): Promise<boolean> {
    return (await this.run("DEL", () => this.client.del(key))) === 1;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.run("EXISTS", () => this.client.exists(key))) === 1;
  }

  async increment(key: string, by = 1): Promise<number> {
    return this.run("INCRBY", () => this.client.incrby(key, by));
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    return (await this.run("EXPIRE", () => this.client.expire(key, seconds))) === 1;
  }

  async close(): Promise<void> {}
}
