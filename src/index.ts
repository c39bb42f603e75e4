export { SearchService } from "@/server/search/service";
export type { SearchCallOptions, SearchServiceDependencies } from "@/server/search/service";
export { SearchResultCache, SEARCH_CACHE_TTL_SECONDS } from "@/server/search/result-cache";
export { buildSearchCacheKey } from "@/server/search/cache-key";
export {
  buildSearchRequest,
  DEFAULT_USER_FIELD_BOOSTS,
  LEXICAL_DEFAULT_LIMIT,
  SEMANTIC_DEFAULT_LIMIT,
} from "@/server/search/query-builder";
export { SearchServiceError, isSearchServiceError } from "@/server/search/errors";
export type { SearchServiceErrorCode } from "@/server/search/errors";
export { createElasticsearchSearchBackend } from "@/adapters/search/elasticsearch";
export { createAlgoliaClient, createAlgoliaSearchBackend } from "@/adapters/search/algolia";
export { createUpstashCacheClient } from "@/adapters/cache/upstash";
export { createTfidfVectorizer, fitTfidfModel } from "@/adapters/vector/tfidf";
export { createOpenAIVectorizer } from "@/adapters/vector/openai";
export { getSearchService } from "@/config/search";
export type { CacheClient } from "@/ports/cache";
export type { SearchBackend, StructuredRequest } from "@/ports/search-backend";
export type { Vectorizer } from "@/ports/vectorizer";
export { SEARCH_DOMAINS } from "@/types/search";
export type * from "@/types/search";
