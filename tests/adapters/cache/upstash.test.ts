import { describe, expect, it, vi } from "vitest";

import { UpstashCacheClient, createUpstashCacheClient } from "@/adapters/cache/upstash";

function createFakeRedis() {
  return {
    get: vi.fn(),
    set: vi.fn(),
    del: vi.fn(),
  };
}

describe("UpstashCacheClient", () => {
  it("returns stored strings as-is", async () => {
    const redis = createFakeRedis();
    redis.get.mockResolvedValue('{"version":1}');

    expect(await new UpstashCacheClient(redis).get("key")).toBe('{"version":1}');
    expect(redis.get).toHaveBeenCalledWith("key");
  });

  it("re-encodes values that were deserialized by the client", async () => {
    const redis = createFakeRedis();
    redis.get.mockResolvedValue({ version: 1 });

    expect(await new UpstashCacheClient(redis).get("key")).toBe('{"version":1}');
  });

  it("maps missing keys to null", async () => {
    const redis = createFakeRedis();
    redis.get.mockResolvedValue(null);

    expect(await new UpstashCacheClient(redis).get("key")).toBeNull();
  });

  it("passes whole-second expiry through", async () => {
    const redis = createFakeRedis();
    const client = new UpstashCacheClient(redis);

    await client.set("a", "1", { ex: 300.7 });
    await client.set("b", "2");
    await client.set("c", "3", { ex: 0 });

    expect(redis.set).toHaveBeenNthCalledWith(1, "a", "1", { ex: 300 });
    expect(redis.set).toHaveBeenNthCalledWith(2, "b", "2");
    expect(redis.set).toHaveBeenNthCalledWith(3, "c", "3");
  });

  it("deletes keys", async () => {
    const redis = createFakeRedis();

    await new UpstashCacheClient(redis).del("key");

    expect(redis.del).toHaveBeenCalledWith("key");
  });
});

describe("createUpstashCacheClient", () => {
  it("returns null without credentials", () => {
    expect(createUpstashCacheClient({ url: "https://cache.test", token: null })).toBeNull();
    expect(createUpstashCacheClient({ url: null, token: "test-secret" })).toBeNull();
  });
});
