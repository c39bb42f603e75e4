import { describe, expect, it } from "vitest";

import {
  buildElasticsearchSearchParams,
  buildIndexMappings,
  resolveIndexName,
  toBackendHits,
} from "@/adapters/search/elasticsearch";
import type { StructuredRequest } from "@/ports/search-backend";

describe("resolveIndexName", () => {
  it("prefixes and lowercases index names", () => {
    expect(resolveIndexName("messages", "Staging")).toBe("staging_messages");
    expect(resolveIndexName("rooms", "  ")).toBe("rooms");
    expect(resolveIndexName("users", null)).toBe("users");
  });
});

describe("buildElasticsearchSearchParams", () => {
  it("translates a lexical message request", () => {
    const request: StructuredRequest = {
      domain: "messages",
      match: [{ kind: "match", field: "content", query: "hello" }],
      filter: [{ kind: "term", field: "roomId", value: "r1" }],
      sort: [{ field: "timestamp", order: "desc" }],
      size: 50,
    };

    expect(buildElasticsearchSearchParams(request, "messages")).toEqual({
      index: "messages",
      query: {
        bool: {
          must: [{ match: { content: "hello" } }],
          filter: [{ term: { roomId: "r1" } }],
        },
      },
      size: 50,
      _source: { excludes: ["content_vector"] },
      sort: [{ timestamp: { order: "desc" } }],
    });
  });

  it("formats boosted prefix matching for users", () => {
    const params = buildElasticsearchSearchParams(
      {
        domain: "users",
        match: [
          {
            kind: "multi_match",
            query: "ann",
            fields: [
              { field: "username", boost: 2 },
              { field: "email", boost: 1 },
            ],
            prefix: true,
          },
        ],
        filter: [],
        sort: [],
        size: 10,
      },
      "users",
    );

    expect(params.query).toEqual({
      bool: {
        must: [{ multi_match: { query: "ann", fields: ["username^2", "email"], type: "bool_prefix" } }],
        filter: [],
      },
    });
    expect(params).not.toHaveProperty("sort");
  });

  it("scores semantic requests with offset cosine similarity over vectorized documents", () => {
    const params = buildElasticsearchSearchParams(
      {
        domain: "messages",
        match: [
          {
            kind: "vector_similarity",
            field: "content_vector",
            vector: [0.6, 0.8],
            offset: 1,
            candidates: { kind: "match", field: "content", query: "hike" },
          },
        ],
        filter: [],
        sort: [],
        size: 20,
      },
      "messages",
    );

    expect(params.query).toEqual({
      bool: {
        must: [
          {
            script_score: {
              query: {
                bool: {
                  must: [{ match: { content: "hike" } }],
                  filter: [{ exists: { field: "content_vector" } }],
                },
              },
              script: {
                source: "cosineSimilarity(params.query_vector, 'content_vector') + params.offset",
                params: { query_vector: [0.6, 0.8], offset: 1 },
              },
            },
          },
        ],
        filter: [],
      },
    });
  });
});

describe("toBackendHits", () => {
  it("maps ids, scores and sources", () => {
    expect(
      toBackendHits([
        { _index: "users", _id: "u1", _score: 2.5, _source: { userId: "u1" } },
        { _index: "users", _id: "u2", _score: null },
      ]),
    ).toEqual([
      { id: "u1", score: 2.5, source: { userId: "u1" } },
      { id: "u2", score: null, source: {} },
    ]);
  });
});

describe("buildIndexMappings", () => {
  it("adds the dense vector field only when dimensions are known", () => {
    expect(buildIndexMappings("messages", 3).properties).toHaveProperty("content_vector", {
      type: "dense_vector",
      dims: 3,
    });
    expect(buildIndexMappings("messages", null).properties).not.toHaveProperty("content_vector");
  });

  it("maps room members as keywords", () => {
    expect(buildIndexMappings("rooms", null).properties?.members).toEqual({ type: "keyword" });
  });
});
