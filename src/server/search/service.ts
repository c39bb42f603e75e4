import { debugLog } from "@/lib/debug";
import type { CacheClient } from "@/ports/cache";
import {
  type SearchBackend,
  type SearchBackendHit,
  UnsupportedSearchRequestError,
} from "@/ports/search-backend";
import type { Vectorizer } from "@/ports/vectorizer";
import type {
  MessageDocument,
  MessageInput,
  RoomDocument,
  RoomInput,
  SearchDocument,
  SearchDocumentMap,
  SearchDomain,
  SearchFilters,
  SearchIntent,
  SearchMode,
  SearchResult,
  UserDocument,
  UserInput,
} from "@/types/search";

import { buildSearchCacheKey } from "./cache-key";
import {
  MESSAGE_VECTOR_FIELD,
  parseDocument,
  prepareMessageDocument,
  prepareRoomDocument,
  prepareUserDocument,
} from "./documents";
import { SearchServiceError, getErrorSummary } from "./errors";
import { type UserFieldBoosts, assertValidIntent, buildSearchRequest } from "./query-builder";
import { SearchResultCache } from "./result-cache";

export type SearchServiceDependencies = {
  backend: SearchBackend;
  cache?: CacheClient | null;
  vectorizer?: Vectorizer | null;
  now?: () => Date;
  cacheTtlSeconds?: number;
  userFieldBoosts?: Partial<UserFieldBoosts> | null;
};

export type SearchCallOptions = {
  signal?: AbortSignal;
};

function abortedError(domain: SearchDomain, signal: AbortSignal): SearchServiceError {
  return new SearchServiceError("aborted", `Search on ${domain} was aborted`, { domain }, {
    cause: signal.reason,
  });
}

function throwIfAborted(domain: SearchDomain, signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortedError(domain, signal);
}

function raceWithSignal<T>(task: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return task;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Facade in front of the search backend: validates intents, consults the
 * result cache, builds structured requests and normalizes backend hits.
 * Indexing does not invalidate cached queries; results may stay stale for up
 * to the cache TTL.
 */
export class SearchService {
  private readonly backend: SearchBackend;
  private readonly vectorizer: Vectorizer | null;
  private readonly cache: SearchResultCache;
  private readonly now: () => Date;
  private readonly userFieldBoosts: Partial<UserFieldBoosts> | null;

  constructor(dependencies: SearchServiceDependencies) {
    this.backend = dependencies.backend;
    this.vectorizer = dependencies.vectorizer ?? null;
    this.now = dependencies.now ?? (() => new Date());
    this.userFieldBoosts = dependencies.userFieldBoosts ?? null;
    this.cache = new SearchResultCache({
      client: dependencies.cache ?? null,
      ttlSeconds: dependencies.cacheTtlSeconds,
      now: () => this.now().getTime(),
    });
  }

  indexDocument(domain: "messages", input: MessageInput, options?: SearchCallOptions): Promise<MessageDocument>;
  indexDocument(domain: "users", input: UserInput, options?: SearchCallOptions): Promise<UserDocument>;
  indexDocument(domain: "rooms", input: RoomInput, options?: SearchCallOptions): Promise<RoomDocument>;
  async indexDocument(
    domain: SearchDomain,
    input: MessageInput | UserInput | RoomInput,
    options: SearchCallOptions = {},
  ): Promise<SearchDocument> {
    switch (domain) {
      case "messages": {
        const document = prepareMessageDocument(input, this.now());
        const body: Record<string, unknown> = { ...document };
        const vector = await this.vectorizeForIndex(document);
        if (vector) {
          body[MESSAGE_VECTOR_FIELD] = vector;
        }
        await this.dispatchIndex(domain, document.messageId, body, options);
        return document;
      }
      case "users": {
        const document = prepareUserDocument(input);
        await this.dispatchIndex(domain, document.userId, { ...document }, options);
        return document;
      }
      case "rooms": {
        const document = prepareRoomDocument(input);
        await this.dispatchIndex(domain, document.roomId, { ...document }, options);
        return document;
      }
    }
  }

  indexMessage(input: MessageInput, options?: SearchCallOptions): Promise<MessageDocument> {
    return this.indexDocument("messages", input, options);
  }

  indexUser(input: UserInput, options?: SearchCallOptions): Promise<UserDocument> {
    return this.indexDocument("users", input, options);
  }

  indexRoom(input: RoomInput, options?: SearchCallOptions): Promise<RoomDocument> {
    return this.indexDocument("rooms", input, options);
  }

  async search<D extends SearchDomain>(
    domain: D,
    intent: SearchIntent,
    mode: SearchMode = "lexical",
    options: SearchCallOptions = {},
  ): Promise<SearchResult<SearchDocumentMap[D]>[]> {
    const { signal } = options;
    assertValidIntent(domain, intent, mode);
    throwIfAborted(domain, signal);

    const key = buildSearchCacheKey({
      domain,
      mode,
      query: intent.query,
      filters: intent.filters ?? null,
      context: intent.context ?? null,
      limit: intent.limit ?? null,
      userId: domain === "rooms" ? intent.userId ?? null : null,
    });

    const cached = await this.runAbortable(domain, signal, this.cache.get(key, domain));
    if (cached) {
      return cached;
    }

    const request = await this.runAbortable(
      domain,
      signal,
      buildSearchRequest(domain, intent, mode, {
        vectorizer: this.vectorizer,
        userFieldBoosts: this.userFieldBoosts,
      }),
    );
    throwIfAborted(domain, signal);

    let hits: SearchBackendHit[];
    try {
      hits = await this.backend.search(request, signal ? { signal } : {});
    } catch (error) {
      if (signal?.aborted) throw abortedError(domain, signal);
      if (error instanceof UnsupportedSearchRequestError) {
        throw new SearchServiceError(
          "invalid_intent",
          `Search backend cannot serve this request: ${error.message}`,
          { domain, vendor: this.backend.vendor },
          { cause: error },
        );
      }
      throw new SearchServiceError(
        "backend_unavailable",
        `Search backend query failed: ${getErrorSummary(error)}`,
        { domain, vendor: this.backend.vendor },
        { cause: error },
      );
    }

    const results = this.normalizeHits(domain, hits);
    throwIfAborted(domain, signal);
    await this.cache.put(key, domain, results);
    debugLog("search:service", "backend results cached", { key, count: results.length });
    return results;
  }

  searchMessages(
    query: string,
    filters?: SearchFilters | null,
    options?: SearchCallOptions,
  ): Promise<SearchResult<MessageDocument>[]> {
    return this.search("messages", { query, filters: filters ?? null }, "lexical", options);
  }

  semanticSearch(
    query: string,
    context: string,
    options?: SearchCallOptions,
  ): Promise<SearchResult<MessageDocument>[]> {
    return this.search("messages", { query, context }, "semantic", options);
  }

  searchUsers(query: string, options?: SearchCallOptions): Promise<SearchResult<UserDocument>[]> {
    return this.search("users", { query }, "lexical", options);
  }

  searchRooms(
    query: string,
    userId: string,
    options?: SearchCallOptions,
  ): Promise<SearchResult<RoomDocument>[]> {
    return this.search("rooms", { query, userId }, "lexical", options);
  }

  private async runAbortable<T>(
    domain: SearchDomain,
    signal: AbortSignal | undefined,
    task: Promise<T>,
  ): Promise<T> {
    try {
      return await raceWithSignal(task, signal);
    } catch (error) {
      if (signal?.aborted) throw abortedError(domain, signal);
      throw error;
    }
  }

  private async vectorizeForIndex(document: MessageDocument): Promise<number[] | null> {
    if (!this.vectorizer) {
      debugLog("search:service", "no vectorizer configured; indexing without vector", {
        messageId: document.messageId,
      });
      return null;
    }
    try {
      return await this.vectorizer.vectorize(document.content);
    } catch (error) {
      console.warn("message vectorization failed; indexing without vector", {
        messageId: document.messageId,
        error: getErrorSummary(error),
      });
      return null;
    }
  }

  private async dispatchIndex(
    domain: SearchDomain,
    id: string,
    body: Record<string, unknown>,
    options: SearchCallOptions,
  ): Promise<void> {
    const { signal } = options;
    throwIfAborted(domain, signal);
    try {
      await this.backend.index(domain, id, body, signal ? { signal } : {});
    } catch (error) {
      if (signal?.aborted) throw abortedError(domain, signal);
      throw new SearchServiceError(
        "backend_unavailable",
        `Search backend rejected ${domain} document ${id}: ${getErrorSummary(error)}`,
        { domain, id, vendor: this.backend.vendor },
        { cause: error },
      );
    }
  }

  private normalizeHits<D extends SearchDomain>(
    domain: D,
    hits: SearchBackendHit[],
  ): SearchResult<SearchDocumentMap[D]>[] {
    const results: SearchResult<SearchDocumentMap[D]>[] = [];
    for (const hit of hits) {
      const document = parseDocument(domain, hit.source);
      if (!document) {
        console.warn("search hit dropped: document failed validation", { domain, id: hit.id });
        continue;
      }
      results.push({ id: hit.id, score: hit.score, document });
    }
    return results;
  }
}
