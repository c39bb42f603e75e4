import { createAlgoliaClient, createAlgoliaSearchBackend } from "@/adapters/search/algolia";
import { createElasticsearchSearchBackend } from "@/adapters/search/elasticsearch";
import { serverEnv } from "@/lib/env/server";
import type { SearchBackend } from "@/ports/search-backend";

const configuredVendor = serverEnv.SEARCH_BACKEND_VENDOR;

let backendInstance: SearchBackend | null | undefined;

function resolveElasticsearch(): SearchBackend | null {
  const node = serverEnv.ELASTICSEARCH_URL;
  if (!node) {
    console.warn("ELASTICSEARCH_URL is not set; search backend unavailable.");
    return null;
  }
  return createElasticsearchSearchBackend({
    node,
    apiKey: serverEnv.ELASTICSEARCH_API_KEY,
    username: serverEnv.ELASTICSEARCH_USERNAME,
    password: serverEnv.ELASTICSEARCH_PASSWORD,
    indexPrefix: serverEnv.SEARCH_INDEX_PREFIX,
    refreshOnWrite: serverEnv.ELASTICSEARCH_REFRESH_ON_WRITE,
  });
}

function resolveAlgolia(): SearchBackend | null {
  const appId = serverEnv.ALGOLIA_APP_ID;
  const apiKey = serverEnv.ALGOLIA_API_KEY;
  if (!appId || !apiKey) {
    console.warn("ALGOLIA_APP_ID/ALGOLIA_API_KEY are not set; search backend unavailable.");
    return null;
  }
  return createAlgoliaSearchBackend(createAlgoliaClient(appId, apiKey), serverEnv.SEARCH_INDEX_PREFIX);
}

function resolveBackend(): SearchBackend | null {
  try {
    switch (configuredVendor) {
      case "algolia":
        return resolveAlgolia();
      case "elasticsearch":
      case "":
        return resolveElasticsearch();
      default:
        console.warn(`Unknown search vendor "${configuredVendor}". Falling back to Elasticsearch.`);
        return resolveElasticsearch();
    }
  } catch (error) {
    console.warn("Search backend initialization failed", error);
    return null;
  }
}

export function getSearchBackend(): SearchBackend | null {
  if (backendInstance === undefined) {
    backendInstance = resolveBackend();
  }
  return backendInstance;
}

export function getSearchBackendVendor(): string {
  return configuredVendor || "elasticsearch";
}
