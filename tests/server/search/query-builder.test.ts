import { describe, expect, it, vi } from "vitest";

import type { Vectorizer } from "@/ports/vectorizer";
import { VectorizationError } from "@/ports/vectorizer";
import {
  LEXICAL_DEFAULT_LIMIT,
  MAX_RESULT_LIMIT,
  SEMANTIC_DEFAULT_LIMIT,
  buildSearchRequest,
  resolveResultLimit,
} from "@/server/search/query-builder";

function stubVectorizer(vector: number[] = [0.6, 0.8, 0]) {
  const vectorize = vi.fn(async (_text: string) => vector);
  const vectorizer: Vectorizer = { vendor: "stub", dimensions: vector.length, vectorize };
  return { vectorizer, vectorize };
}

describe("buildSearchRequest", () => {
  it("matches message content, sorts newest first and applies sorted filters", async () => {
    const request = await buildSearchRequest(
      "messages",
      { query: "hello", filters: { roomId: "room-1", messageType: "text" } },
      "lexical",
      { vectorizer: null },
    );

    expect(request).toEqual({
      domain: "messages",
      match: [{ kind: "match", field: "content", query: "hello" }],
      filter: [
        { kind: "term", field: "messageType", value: "text" },
        { kind: "term", field: "roomId", value: "room-1" },
      ],
      sort: [{ field: "timestamp", order: "desc" }],
      size: LEXICAL_DEFAULT_LIMIT,
    });
  });

  it("is deterministic regardless of filter insertion order", async () => {
    const first = await buildSearchRequest(
      "messages",
      { query: "hello", filters: { userId: "u1", roomId: "r1" } },
      "lexical",
      { vectorizer: null },
    );
    const second = await buildSearchRequest(
      "messages",
      { query: "hello", filters: { roomId: "r1", userId: "u1" } },
      "lexical",
      { vectorizer: null },
    );

    expect(JSON.stringify(first)).toBe(JSON.stringify(second));
  });

  it("searches users by username and email prefix with username boosted", async () => {
    const request = await buildSearchRequest("users", { query: "ann" }, "lexical", { vectorizer: null });

    expect(request.match).toEqual([
      {
        kind: "multi_match",
        query: "ann",
        fields: [
          { field: "username", boost: 2 },
          { field: "email", boost: 1 },
        ],
        prefix: true,
      },
    ]);
    expect(request.sort).toEqual([]);
    expect(request.filter).toEqual([]);
  });

  it("applies configured user field boosts", async () => {
    const request = await buildSearchRequest("users", { query: "ann" }, "lexical", {
      vectorizer: null,
      userFieldBoosts: { username: 4 },
    });

    expect(request.match[0]).toMatchObject({
      fields: [
        { field: "username", boost: 4 },
        { field: "email", boost: 1 },
      ],
    });
  });

  it("always restricts room search to the requesting member before caller filters", async () => {
    const request = await buildSearchRequest(
      "rooms",
      { query: "general", userId: "u1", filters: { members: "u2" } },
      "lexical",
      { vectorizer: null },
    );

    expect(request.match).toEqual([{ kind: "match", field: "name", query: "general" }]);
    expect(request.filter).toEqual([
      { kind: "term", field: "members", value: "u1" },
      { kind: "term", field: "members", value: "u2" },
    ]);
  });

  it("vectorizes query and context once for semantic search", async () => {
    const { vectorizer, vectorize } = stubVectorizer();

    const request = await buildSearchRequest(
      "messages",
      { query: " weekend ", context: "mountain hike" },
      "semantic",
      { vectorizer },
    );

    expect(vectorize).toHaveBeenCalledTimes(1);
    expect(vectorize).toHaveBeenCalledWith("weekend mountain hike");
    expect(request).toEqual({
      domain: "messages",
      match: [
        {
          kind: "vector_similarity",
          field: "content_vector",
          vector: [0.6, 0.8, 0],
          offset: 1,
          candidates: null,
        },
      ],
      filter: [],
      sort: [],
      size: SEMANTIC_DEFAULT_LIMIT,
    });
  });

  it("allows semantic search with only a context", async () => {
    const { vectorizer, vectorize } = stubVectorizer();

    await buildSearchRequest("messages", { query: "", context: "hiking plans" }, "semantic", { vectorizer });

    expect(vectorize).toHaveBeenCalledWith("hiking plans");
  });

  it("restricts hybrid similarity to lexical candidates", async () => {
    const { vectorizer } = stubVectorizer();

    const request = await buildSearchRequest("messages", { query: "hike" }, "hybrid", { vectorizer });

    expect(request.match[0]).toMatchObject({
      kind: "vector_similarity",
      candidates: { kind: "match", field: "content", query: "hike" },
    });
    expect(request.size).toBe(LEXICAL_DEFAULT_LIMIT);
  });

  it.each([
    ["empty query and context", "messages", { query: "  " }, "lexical"],
    ["lexical without query", "messages", { query: "", context: "ctx" }, "lexical"],
    ["semantic without context", "messages", { query: "hello" }, "semantic"],
    ["semantic users", "users", { query: "ann", context: "ctx" }, "semantic"],
    ["zero limit", "messages", { query: "hello", limit: 0 }, "lexical"],
    ["fractional limit", "messages", { query: "hello", limit: 2.5 }, "lexical"],
    ["rooms without user", "rooms", { query: "general" }, "lexical"],
  ] as const)("rejects %s as an invalid intent", async (_label, domain, intent, mode) => {
    const { vectorizer, vectorize } = stubVectorizer();

    await expect(buildSearchRequest(domain, intent, mode, { vectorizer })).rejects.toMatchObject({
      name: "SearchServiceError",
      code: "invalid_intent",
    });
    expect(vectorize).not.toHaveBeenCalled();
  });

  it("rejects filter values that are not scalars", async () => {
    await expect(
      buildSearchRequest(
        "messages",
        { query: "hello", filters: { roomId: Number.NaN } },
        "lexical",
        { vectorizer: null },
      ),
    ).rejects.toMatchObject({ code: "invalid_intent", message: 'Filter "roomId" must be a string, number or boolean' });
  });

  it("reports vectorization failures", async () => {
    const vectorizer: Vectorizer = {
      vendor: "stub",
      dimensions: 3,
      vectorize: vi.fn(async () => {
        throw new VectorizationError("zero_vector", "no known terms");
      }),
    };

    await expect(
      buildSearchRequest("messages", { query: "", context: "zzz" }, "semantic", { vectorizer }),
    ).rejects.toMatchObject({
      code: "vectorization_failed",
      message: "Could not vectorize search text: no known terms",
    });
  });

  it("reports a missing vectorizer as a vectorization failure", async () => {
    await expect(
      buildSearchRequest("messages", { query: "", context: "hike" }, "semantic", { vectorizer: null }),
    ).rejects.toMatchObject({ code: "vectorization_failed" });
  });
});

describe("resolveResultLimit", () => {
  it("uses per-mode defaults", () => {
    expect(resolveResultLimit({ query: "a" }, "lexical")).toBe(50);
    expect(resolveResultLimit({ query: "a" }, "hybrid")).toBe(50);
    expect(resolveResultLimit({ query: "", context: "a" }, "semantic")).toBe(20);
  });

  it("keeps explicit limits and clamps large ones", () => {
    expect(resolveResultLimit({ query: "a", limit: 5 }, "lexical")).toBe(5);
    expect(resolveResultLimit({ query: "a", limit: 10_000 }, "lexical")).toBe(MAX_RESULT_LIMIT);
  });
});
