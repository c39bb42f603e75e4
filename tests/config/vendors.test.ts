import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("vendor wiring", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("builds an Elasticsearch backend from the environment", async () => {
    vi.stubEnv("SEARCH_BACKEND_VENDOR", "elasticsearch");
    vi.stubEnv("ELASTICSEARCH_URL", "http://localhost:9200");

    const { getSearchBackend, getSearchBackendVendor } = await import("@/config/search-backend");

    expect(getSearchBackend()?.vendor).toBe("elasticsearch");
    expect(getSearchBackend()).toBe(getSearchBackend());
    expect(getSearchBackendVendor()).toBe("elasticsearch");
  });

  it("disables Algolia without credentials", async () => {
    vi.stubEnv("SEARCH_BACKEND_VENDOR", "algolia");
    vi.stubEnv("ALGOLIA_APP_ID", "");
    vi.stubEnv("ALGOLIA_API_KEY", "");

    const { getSearchBackend } = await import("@/config/search-backend");

    expect(getSearchBackend()).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(
      "ALGOLIA_APP_ID/ALGOLIA_API_KEY are not set; search backend unavailable.",
    );
  });

  it("turns the cache off when asked", async () => {
    vi.stubEnv("CACHE_VENDOR", "none");

    const { getCacheClient, getCacheVendor } = await import("@/config/cache");

    expect(getCacheClient()).toBeNull();
    expect(getCacheVendor()).toBe("none");
  });

  it("falls back to Upstash for unknown cache vendors", async () => {
    vi.stubEnv("CACHE_VENDOR", "memcached");
    vi.stubEnv("UPSTASH_REDIS_REST_URL", "https://cache.test");
    vi.stubEnv("UPSTASH_REDIS_REST_TOKEN", "test-secret");

    const { getCacheClient } = await import("@/config/cache");

    expect(getCacheClient()).not.toBeNull();
    expect(console.warn).toHaveBeenCalledWith('Unknown cache vendor "memcached". Falling back to Upstash.');
  });

  it("fits the TF-IDF vectorizer on the bundled corpus by default", async () => {
    vi.stubEnv("VECTORIZER_VENDOR", "tfidf");
    vi.stubEnv("VECTORIZER_MODEL_PATH", "");
    vi.stubEnv("VECTORIZER_CORPUS_PATH", "");

    const { getVectorizer } = await import("@/config/vectorizer");
    const vectorizer = await getVectorizer();

    expect(vectorizer?.vendor).toBe("tfidf");
    expect(vectorizer?.dimensions).toBeGreaterThan(0);
  });
});
