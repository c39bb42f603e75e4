import { serverEnv } from "@/lib/env/server";
import { SearchService } from "@/server/search/service";

import { getCacheClient } from "./cache";
import { getSearchBackend } from "./search-backend";
import { getVectorizer } from "./vectorizer";

let servicePromise: Promise<SearchService | null> | null = null;

async function createSearchService(): Promise<SearchService | null> {
  const backend = getSearchBackend();
  if (!backend) return null;
  const vectorizer = await getVectorizer();
  return new SearchService({
    backend,
    cache: getCacheClient(),
    vectorizer,
    cacheTtlSeconds: serverEnv.SEARCH_CACHE_TTL_SECONDS ?? undefined,
  });
}

/** Process-wide service composed from the environment. Null when no backend is configured. */
export async function getSearchService(): Promise<SearchService | null> {
  if (!servicePromise) {
    servicePromise = createSearchService();
  }
  return servicePromise;
}
