import { z } from "zod";

import { debugLog } from "@/lib/debug";
import type { CacheClient } from "@/ports/cache";
import type { SearchDocumentMap, SearchDomain, SearchResult } from "@/types/search";

import { parseDocument } from "./documents";
import { getErrorSummary } from "./errors";

export const SEARCH_CACHE_TTL_SECONDS = 60 * 5; // 5 minutes

const CACHE_ENTRY_VERSION = 1;

const cacheEntrySchema = z.object({
  version: z.literal(CACHE_ENTRY_VERSION),
  domain: z.enum(["messages", "users", "rooms"]),
  storedAt: z.number().int().nonnegative(),
  expiresAt: z.number().int().nonnegative(),
  results: z.array(
    z.object({
      id: z.string(),
      score: z.number().nullable(),
      document: z.unknown(),
    }),
  ),
});

type CacheEntry = z.infer<typeof cacheEntrySchema>;

export type SearchResultCacheOptions = {
  client: CacheClient | null;
  ttlSeconds?: number;
  now?: () => number;
};

function isLikelyJsonPayload(raw: string): boolean {
  const trimmed = raw.trim();
  if (!trimmed.length) return false;
  return trimmed.startsWith("{") && trimmed.endsWith("}");
}

/**
 * Read-through result cache. Store failures and malformed payloads degrade to
 * a miss; entries are never returned once `expiresAt` has passed, whatever the
 * store's own expiry does.
 */
export class SearchResultCache {
  private readonly client: CacheClient | null;
  private readonly now: () => number;
  readonly ttlSeconds: number;

  constructor(options: SearchResultCacheOptions) {
    this.client = options.client;
    this.now = options.now ?? Date.now;
    const ttl = options.ttlSeconds ?? SEARCH_CACHE_TTL_SECONDS;
    this.ttlSeconds = Number.isFinite(ttl) && ttl > 0 ? Math.floor(ttl) : SEARCH_CACHE_TTL_SECONDS;
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  async get<D extends SearchDomain>(
    key: string,
    domain: D,
  ): Promise<SearchResult<SearchDocumentMap[D]>[] | null> {
    const client = this.client;
    if (!client) return null;

    let raw: string | null;
    try {
      raw = await client.get(key);
    } catch (error) {
      console.warn("search cache read failed", { key, error: getErrorSummary(error) });
      return null;
    }
    if (raw === null) {
      debugLog("search:cache", "miss", { key });
      return null;
    }

    const entry = this.parseEntry(raw);
    if (!entry || entry.domain !== domain) {
      console.warn("search cache entry malformed; treating as miss", { key });
      await this.discard(key);
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      debugLog("search:cache", "expired", { key, expiresAt: entry.expiresAt });
      return null;
    }

    const results: SearchResult<SearchDocumentMap[D]>[] = [];
    for (const item of entry.results) {
      const document = parseDocument(domain, item.document);
      if (!document) {
        console.warn("search cache entry holds an invalid document; treating as miss", { key });
        await this.discard(key);
        return null;
      }
      results.push({ id: item.id, score: item.score, document });
    }
    debugLog("search:cache", "hit", { key, count: results.length });
    return results;
  }

  async put<D extends SearchDomain>(
    key: string,
    domain: D,
    results: SearchResult<SearchDocumentMap[D]>[],
    ttlSeconds: number = this.ttlSeconds,
  ): Promise<void> {
    const client = this.client;
    if (!client) return;
    const storedAt = this.now();
    const entry: CacheEntry = {
      version: CACHE_ENTRY_VERSION,
      domain,
      storedAt,
      expiresAt: storedAt + ttlSeconds * 1000,
      results,
    };
    try {
      await client.set(key, JSON.stringify(entry), { ex: ttlSeconds });
    } catch (error) {
      console.warn("search cache write failed", { key, error: getErrorSummary(error) });
    }
  }

  private parseEntry(raw: string): CacheEntry | null {
    if (!isLikelyJsonPayload(raw)) return null;
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = cacheEntrySchema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }

  private async discard(key: string): Promise<void> {
    try {
      await this.client?.del(key);
    } catch (error) {
      console.warn("search cache delete failed", { key, error: getErrorSummary(error) });
    }
  }
}
