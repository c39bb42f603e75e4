import { Redis } from "@upstash/redis";

import type { CacheClient, CacheSetOptions } from "@/ports/cache";

export type UpstashCacheConfig = {
  url: string | null;
  token: string | null;
};

type RedisCommands = Pick<Redis, "get" | "set" | "del">;

export class UpstashCacheClient implements CacheClient {
  constructor(private readonly redis: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    const value = await this.redis.get<unknown>(key);
    if (value === null || value === undefined) return null;
    // Payloads are stored as text; anything else came from a client with
    // automatic deserialization on and is re-encoded for validation upstream.
    return typeof value === "string" ? value : JSON.stringify(value);
  }

  async set(key: string, value: string, options?: CacheSetOptions): Promise<void> {
    if (options && typeof options.ex === "number" && options.ex > 0) {
      await this.redis.set(key, value, { ex: Math.floor(options.ex) });
      return;
    }
    await this.redis.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

export function createUpstashRedis(config: UpstashCacheConfig): Redis | null {
  const url = config.url?.trim();
  const token = config.token?.trim();
  if (!url || !token) return null;
  return new Redis({ url, token, automaticDeserialization: false });
}

export function createUpstashCacheClient(config: UpstashCacheConfig): CacheClient | null {
  const redis = createUpstashRedis(config);
  if (!redis) return null;
  return new UpstashCacheClient(redis);
}
