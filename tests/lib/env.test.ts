import { describe, expect, it } from "vitest";

import { parseServerEnv } from "@/lib/env/server";

describe("parseServerEnv", () => {
  it("applies defaults for an empty environment", () => {
    const env = parseServerEnv({});

    expect(env.SEARCH_BACKEND_VENDOR).toBe("elasticsearch");
    expect(env.CACHE_VENDOR).toBe("upstash");
    expect(env.VECTORIZER_VENDOR).toBe("tfidf");
    expect(env.ELASTICSEARCH_URL).toBeNull();
    expect(env.ELASTICSEARCH_REFRESH_ON_WRITE).toBe(false);
    expect(env.SEARCH_CACHE_TTL_SECONDS).toBeNull();
  });

  it("normalizes vendors, urls, numbers and flags", () => {
    const env = parseServerEnv({
      SEARCH_BACKEND_VENDOR: "  Algolia ",
      ES_URL: "http://search.test:9200/",
      SEARCH_CACHE_TTL: "120.9",
      VECTORIZER_MAX_FEATURES: "-4",
      ELASTICSEARCH_REFRESH_ON_WRITE: "yes",
    });

    expect(env.SEARCH_BACKEND_VENDOR).toBe("algolia");
    expect(env.ELASTICSEARCH_URL).toBe("http://search.test:9200");
    expect(env.SEARCH_CACHE_TTL_SECONDS).toBe(120);
    expect(env.VECTORIZER_MAX_FEATURES).toBeNull();
    expect(env.ELASTICSEARCH_REFRESH_ON_WRITE).toBe(true);
  });

  it("prefers the primary key over fallbacks and skips blank values", () => {
    const env = parseServerEnv({
      OPENAI_API_KEY: "   ",
      OPENAI_KEY: "test-secret",
      ELASTICSEARCH_URL: "http://primary.test",
      ELASTIC_URL: "http://fallback.test",
    });

    expect(env.OPENAI_API_KEY).toBe("test-secret");
    expect(env.ELASTICSEARCH_URL).toBe("http://primary.test");
  });

  it("leaves debug namespaces to the debug logger", () => {
    const env = parseServerEnv({ SEARCH_DEBUG: "search:*", DEBUG: "*" });

    expect(Object.keys(env)).not.toContain("SEARCH_DEBUG");
  });

  it("reports invalid urls by variable name", () => {
    expect(() => parseServerEnv({ UPSTASH_REDIS_REST_URL: "not a url" })).toThrow(
      /^Invalid server environment configuration: UPSTASH_REDIS_REST_URL: /,
    );
  });
});
