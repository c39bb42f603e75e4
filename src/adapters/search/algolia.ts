import { type IndexSettings, type SearchClient, searchClient } from "@algolia/client-search";

import type {
  MatchClause,
  SearchBackend,
  SearchBackendCallOptions,
  SearchBackendHit,
  SortSpec,
  StructuredRequest,
  TermFilter,
} from "@/ports/search-backend";
import { UnsupportedSearchRequestError } from "@/ports/search-backend";
import { getErrorSummary } from "@/server/search/errors";
import type { SearchDomain } from "@/types/search";

import { resolveIndexName } from "./elasticsearch";

export type AlgoliaSearchParams = {
  query: string;
  hitsPerPage: number;
  filters?: string;
  restrictSearchableAttributes?: string[];
};

type AlgoliaIndexOperations = Pick<
  SearchClient,
  "saveObjects" | "searchSingleIndex" | "setSettings" | "waitForTask"
>;

type SortReplica = {
  field: string;
  order: SortSpec["order"];
  /** Numeric copy of `field` written at index time; Algolia only sorts on numbers. */
  rankingAttribute: string;
};

type IndexAttributes = {
  searchable: string[];
  filterable: string[];
};

const SORT_REPLICAS: Record<SearchDomain, SortReplica[]> = {
  messages: [{ field: "timestamp", order: "desc", rankingAttribute: "timestampEpochMs" }],
  users: [],
  rooms: [],
};

const INDEX_ATTRIBUTES: Record<SearchDomain, IndexAttributes> = {
  messages: { searchable: ["content"], filterable: ["messageId", "userId", "roomId", "messageType"] },
  // Attribute order doubles as ranking priority: username before email.
  users: { searchable: ["username", "email"], filterable: ["userId"] },
  rooms: { searchable: ["name", "description"], filterable: ["roomId", "members"] },
};

const DEFAULT_RANKING = ["typo", "geo", "words", "filters", "proximity", "attribute", "exact", "custom"];

export function replicaIndexName(indexName: string, replica: Pick<SortReplica, "field" | "order">): string {
  return `${indexName}_${replica.field}_${replica.order}`;
}

/**
 * Algolia sorts through replica indices rather than per query. Sorted
 * requests are routed to the matching replica; sorts without one are
 * rejected instead of silently falling back to relevance order.
 */
export function resolveSearchIndexName(indexName: string, request: StructuredRequest): string {
  if (!request.sort.length) return indexName;
  const [sort] = request.sort;
  const replica =
    request.sort.length === 1 && sort
      ? SORT_REPLICAS[request.domain].find((entry) => entry.field === sort.field && entry.order === sort.order)
      : undefined;
  if (!replica) {
    const described = request.sort.map((entry) => `${entry.field} ${entry.order}`).join(", ");
    throw new UnsupportedSearchRequestError(
      `Algolia backend has no sorted replica for ${request.domain} by ${described}`,
    );
  }
  return replicaIndexName(indexName, replica);
}

export function buildAlgoliaIndexSettings(domain: SearchDomain, indexName: string): IndexSettings {
  const { searchable, filterable } = INDEX_ATTRIBUTES[domain];
  return {
    searchableAttributes: searchable,
    attributesForFaceting: filterable.map((field) => `filterOnly(${field})`),
    replicas: SORT_REPLICAS[domain].map((replica) => replicaIndexName(indexName, replica)),
  };
}

export function buildAlgoliaReplicaSettings(domain: SearchDomain, replica: SortReplica): IndexSettings {
  const { searchable, filterable } = INDEX_ATTRIBUTES[domain];
  return {
    searchableAttributes: searchable,
    attributesForFaceting: filterable.map((field) => `filterOnly(${field})`),
    ranking: [`${replica.order}(${replica.rankingAttribute})`, ...DEFAULT_RANKING],
  };
}

function withRankingAttributes(domain: SearchDomain, body: Record<string, unknown>): Record<string, unknown> {
  const record: Record<string, unknown> = { ...body };
  for (const { field, rankingAttribute } of SORT_REPLICAS[domain]) {
    const value = record[field];
    const epoch = typeof value === "string" ? Date.parse(value) : Number.NaN;
    if (Number.isFinite(epoch)) {
      record[rankingAttribute] = epoch;
    }
  }
  return record;
}

function formatFilter(filter: TermFilter): string {
  return `${filter.field}:${JSON.stringify(filter.value)}`;
}

function collectMatchTargets(clauses: MatchClause[]): { query: string; fields: string[] } {
  const queries: string[] = [];
  const fields: string[] = [];
  for (const clause of clauses) {
    switch (clause.kind) {
      case "match":
        queries.push(clause.query);
        fields.push(clause.field);
        break;
      case "multi_match":
        queries.push(clause.query);
        // Per-query boosts are not expressible; attribute ranking comes from the
        // index's searchableAttributes order.
        fields.push(...clause.fields.map((entry) => entry.field));
        break;
      case "vector_similarity":
        throw new UnsupportedSearchRequestError(
          "Algolia backend does not support vector similarity queries",
        );
    }
  }
  return {
    query: Array.from(new Set(queries)).join(" "),
    fields: Array.from(new Set(fields)),
  };
}

/** Sort specs are applied by {@link resolveSearchIndexName}, not by search params. */
export function buildAlgoliaSearchParams(request: StructuredRequest): AlgoliaSearchParams {
  const { query, fields } = collectMatchTargets(request.match);
  const params: AlgoliaSearchParams = {
    query,
    hitsPerPage: request.size,
  };
  if (request.filter.length) {
    params.filters = request.filter.map(formatFilter).join(" AND ");
  }
  if (fields.length) {
    params.restrictSearchableAttributes = fields;
  }
  return params;
}

function isAlgoliaPermissionError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  const rawMessage = "message" in error ? error.message : null;
  const message = typeof rawMessage === "string" ? rawMessage.toLowerCase() : "";
  if (message.includes("not enough rights") || message.includes("insufficient permissions")) {
    return true;
  }
  const rawStatus = "status" in error ? error.status : null;
  const status =
    typeof rawStatus === "number"
      ? rawStatus
      : typeof rawStatus === "string"
        ? Number(rawStatus)
        : null;
  return status === 401 || status === 403;
}

function assertNotAborted(options: SearchBackendCallOptions | undefined): void {
  options?.signal?.throwIfAborted();
}

export function createAlgoliaSearchBackend(
  client: AlgoliaIndexOperations,
  indexPrefix: string | null,
): SearchBackend {
  let writesDisabled = false;
  let permissionWarningLogged = false;

  const indexName = (domain: SearchDomain) => resolveIndexName(domain, indexPrefix);

  const handlePermissionError = (domain: SearchDomain, error: unknown): void => {
    if (!isAlgoliaPermissionError(error)) return;
    writesDisabled = true;
    if (!permissionWarningLogged) {
      permissionWarningLogged = true;
      console.warn(
        `Algolia write operations disabled for index "${indexName(domain)}": ${getErrorSummary(error)}`,
      );
    }
  };

  return {
    vendor: "algolia",
    async index(domain, id, body, options) {
      if (writesDisabled) {
        throw new Error("Algolia writes are disabled: the configured key lacks write permission");
      }
      assertNotAborted(options);
      try {
        await client.saveObjects({
          indexName: indexName(domain),
          objects: [{ ...withRankingAttributes(domain, body), objectID: id }],
        });
      } catch (error) {
        handlePermissionError(domain, error);
        throw error;
      }
    },
    async search(request, options) {
      assertNotAborted(options);
      const response = await client.searchSingleIndex<Record<string, unknown>>({
        indexName: resolveSearchIndexName(indexName(request.domain), request),
        searchParams: buildAlgoliaSearchParams(request),
      });
      assertNotAborted(options);
      const hits = response.hits ?? [];
      const total = hits.length;
      const sorted = request.sort.length > 0;
      return hits.map((hit, index): SearchBackendHit => {
        const { objectID, _highlightResult, _snippetResult, _rankingInfo, ...source } = hit;
        for (const { rankingAttribute } of SORT_REPLICAS[request.domain]) {
          delete source[rankingAttribute];
        }
        return {
          id: typeof objectID === "string" ? objectID : String(objectID ?? ""),
          // Replica order is not relevance, as with field-sorted Elasticsearch queries.
          score: sorted ? null : total - index,
          source,
        };
      });
    },
    async ensureIndex(domain) {
      const primary = indexName(domain);
      try {
        const { taskID } = await client.setSettings({
          indexName: primary,
          indexSettings: buildAlgoliaIndexSettings(domain, primary),
        });
        // Replicas exist only once the primary settings task has run.
        await client.waitForTask({ indexName: primary, taskID });
        for (const replica of SORT_REPLICAS[domain]) {
          await client.setSettings({
            indexName: replicaIndexName(primary, replica),
            indexSettings: buildAlgoliaReplicaSettings(domain, replica),
          });
        }
      } catch (error) {
        handlePermissionError(domain, error);
        throw error;
      }
      return true;
    },
  };
}

export function createAlgoliaClient(appId: string, apiKey: string): SearchClient {
  return searchClient(appId, apiKey);
}
