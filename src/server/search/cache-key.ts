import { createHash } from "node:crypto";

import type { SearchDomain, SearchFilters, SearchMode } from "@/types/search";

export const SEARCH_CACHE_PREFIX = "search:";
const CACHE_KEY_VERSION = "v1";

export type SearchCacheKeyPayload = {
  domain: SearchDomain;
  mode: SearchMode;
  query: string;
  filters?: SearchFilters | null;
  context?: string | null;
  limit?: number | null;
  userId?: string | null;
};

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(",")}]`;
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
    return `{${entries.map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`).join(",")}}`;
  }
  return JSON.stringify(value ?? null);
}

function normalizeOptionalText(value: string | null | undefined): string | null {
  if (typeof value !== "string") return null;
  return value.trim().length ? value : null;
}

/**
 * Derives the cache key for a logical query. The raw query is kept as typed;
 * filters are keyed by field name so caller ordering never changes the key.
 */
export function buildSearchCacheKey(payload: SearchCacheKeyPayload): string {
  const normalized = {
    query: payload.query,
    filters: payload.filters ?? {},
    context: normalizeOptionalText(payload.context),
    limit: typeof payload.limit === "number" && Number.isFinite(payload.limit) ? payload.limit : null,
    userId: normalizeOptionalText(payload.userId),
  };
  const digest = createHash("sha256").update(stableStringify(normalized)).digest("hex");
  return `${SEARCH_CACHE_PREFIX}${CACHE_KEY_VERSION}:${payload.domain}:${payload.mode}:${digest}`;
}
