import type { ZodType, ZodTypeDef } from "zod";

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export interface CacheProvider {
  readonly name: string;
  get(key: string): Promise<string | null>;
  /** A ttl of 0 or less stores the value without expiry. */
  set(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  /** Atomically stores the value only when the key is absent; true when it was stored. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  increment(key: string, by?: number): Promise<number>;
  expire(key: string, seconds: number): Promise<boolean>;
  /** Parses the stored JSON with the schema; null when the key is absent. */
  getJson<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null>;
  setJson(key: string, value: unknown, ttlSeconds?: number): Promise<boolean>;
  close(): Promise<void>;
}

export abstract class BaseCacheProvider implements CacheProvider {
  abstract readonly name: string;
  abstract get(key: string): Promise<string | null>;
  abstract set(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  abstract setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  abstract delete(key: string): Promise<boolean>;
  abstract exists(key: string): Promise<boolean>;
  abstract increment(key: string, by?: number): Promise<number>;
  abstract expire(key: string, seconds: number): Promise<boolean>;
  abstract close(): Promise<void>;

  async getJson<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    const value = await this.get(key);
    if (value === null) {
      return null;
    }
    return schema.parse(JSON.parse(value));
  }

  async setJson(key: string, value: unknown, ttlSeconds = DEFAULT_CACHE_TTL_SECONDS): Promise<boolean> {
    return this.set(key, JSON.stringify(value), ttlSeconds);
  }
}

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

export class MemoryCacheProvider extends BaseCacheProvider {
  readonly name = "memory";
  private readonly entries = new Map<string, MemoryEntry>();

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private expiryFor(ttlSeconds: number): number | null {
    return ttlSeconds > 0 ? Date.now() + ttlSeconds * 1000 : null;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds = DEFAULT_CACHE_TTL_SECONDS): Promise<boolean> {
    this.entries.set(key, { value, expiresAt: this.expiryFor(ttlSeconds) });
    return true;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: this.expiryFor(ttlSeconds) });
    return true;
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== null;
    this.entries.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== null;
  }

  async increment(key: string, by = 1): Promise<number> {
    const entry = this.live(key);
    const current = entry ? Number.parseInt(entry.value, 10) : 0;
    if (Number.isNaN(current)) {
      throw new Error(`Cache value at ${key} is not an integer`);
    }
    const next = current + by;
    this.entries.set(key, { value: String(next), expiresAt: entry?.expiresAt ?? null });
    return next;
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) {
      return false;
    }
    entry.expiresAt = Date.now() + seconds * 1000;
    return true;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
