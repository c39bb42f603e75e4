import { createUpstashCacheClient } from "@/adapters/cache/upstash";
import { debugLog } from "@/lib/debug";
import { serverEnv } from "@/lib/env/server";
import type { CacheClient } from "@/ports/cache";

const configuredVendor = serverEnv.CACHE_VENDOR;

let client: CacheClient | null | undefined;

function resolveUpstash(): CacheClient | null {
  const upstash = createUpstashCacheClient({
    url: serverEnv.UPSTASH_REDIS_REST_URL,
    token: serverEnv.UPSTASH_REDIS_REST_TOKEN,
  });
  if (!upstash) {
    debugLog("search:config", "Upstash credentials missing; search results will not be cached");
  }
  return upstash;
}

function resolveClient(): CacheClient | null {
  switch (configuredVendor) {
    case "none":
    case "off":
    case "disabled":
      return null;
    case "upstash":
    case "":
      return resolveUpstash();
    default:
      console.warn(`Unknown cache vendor "${configuredVendor}". Falling back to Upstash.`);
      return resolveUpstash();
  }
}

export function getCacheClient(): CacheClient | null {
  if (client === undefined) {
    client = resolveClient();
  }
  return client ?? null;
}

export function getCacheVendor(): string {
  return configuredVendor || "upstash";
}
