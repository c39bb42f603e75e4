import { Client, type ClientOptions, type estypes } from "@elastic/elasticsearch";

import type {
  EnsureIndexOptions,
  FieldBoost,
  MatchClause,
  SearchBackend,
  SearchBackendCallOptions,
  SearchBackendHit,
  SortSpec,
  StructuredRequest,
  TermFilter,
  TextMatchClause,
} from "@/ports/search-backend";
import { MESSAGE_VECTOR_FIELD } from "@/server/search/documents";
import type { SearchDomain } from "@/types/search";

export type ElasticsearchConfig = {
  node: string;
  apiKey?: string | null;
  username?: string | null;
  password?: string | null;
  indexPrefix?: string | null;
  refreshOnWrite?: boolean;
};

export function resolveIndexName(domain: SearchDomain, prefix: string | null | undefined): string {
  const trimmed = (prefix ?? "").trim();
  const base = trimmed.length ? `${trimmed}_${domain}` : domain;
  return base.toLowerCase();
}

function formatBoostedField({ field, boost }: FieldBoost): string {
  return boost === 1 ? field : `${field}^${boost}`;
}

function toTextQuery(clause: TextMatchClause): estypes.QueryDslQueryContainer {
  return { match: { [clause.field]: clause.query } };
}

function toMatchQuery(clause: MatchClause): estypes.QueryDslQueryContainer {
  switch (clause.kind) {
    case "match":
      return toTextQuery(clause);
    case "multi_match":
      return {
        multi_match: {
          query: clause.query,
          fields: clause.fields.map(formatBoostedField),
          type: clause.prefix ? "bool_prefix" : "best_fields",
        },
      };
    case "vector_similarity":
      return {
        script_score: {
          query: {
            bool: {
              must: [clause.candidates ? toTextQuery(clause.candidates) : { match_all: {} }],
              // cosineSimilarity fails on documents without a vector.
              filter: [{ exists: { field: clause.field } }],
            },
          },
          script: {
            source: `cosineSimilarity(params.query_vector, '${clause.field}') + params.offset`,
            params: { query_vector: clause.vector, offset: clause.offset },
          },
        },
      };
  }
}

function toTermQuery(filter: TermFilter): estypes.QueryDslQueryContainer {
  return { term: { [filter.field]: filter.value } };
}

function toSortOptions(entry: SortSpec): estypes.SortCombinations {
  const options: estypes.SortOptions = {};
  options[entry.field] = { order: entry.order };
  return options;
}

export function buildElasticsearchSearchParams(
  request: StructuredRequest,
  indexName: string,
): estypes.SearchRequest {
  const params: estypes.SearchRequest = {
    index: indexName,
    query: {
      bool: {
        must: request.match.map(toMatchQuery),
        filter: request.filter.map(toTermQuery),
      },
    },
    size: request.size,
    _source: { excludes: [MESSAGE_VECTOR_FIELD] },
  };
  if (request.sort.length) {
    params.sort = request.sort.map(toSortOptions);
  }
  return params;
}

export function toBackendHits(
  hits: readonly estypes.SearchHit<Record<string, unknown>>[],
): SearchBackendHit[] {
  return hits.map((hit) => ({
    id: typeof hit._id === "string" ? hit._id : String(hit._id ?? ""),
    score: typeof hit._score === "number" ? hit._score : null,
    source: hit._source ?? {},
  }));
}

const keyword: estypes.MappingProperty = { type: "keyword" };
const text: estypes.MappingProperty = { type: "text" };
const metadata: estypes.MappingProperty = { type: "flattened" };

export function buildIndexMappings(
  domain: SearchDomain,
  vectorDimensions: number | null,
): estypes.MappingTypeMapping {
  switch (domain) {
    case "messages": {
      const properties: Record<string, estypes.MappingProperty> = {
        messageId: keyword,
        content: text,
        userId: keyword,
        roomId: keyword,
        timestamp: { type: "date" },
        messageType: keyword,
        metadata,
      };
      if (vectorDimensions && vectorDimensions > 0) {
        properties[MESSAGE_VECTOR_FIELD] = { type: "dense_vector", dims: vectorDimensions };
      }
      return { properties };
    }
    case "users":
      return {
        properties: {
          userId: keyword,
          username: { type: "text", fields: { keyword } },
          email: text,
          metadata,
        },
      };
    case "rooms":
      return {
        properties: {
          roomId: keyword,
          name: text,
          description: text,
          members: keyword,
          metadata,
        },
      };
  }
}

function toTransportOptions(options: SearchBackendCallOptions | undefined) {
  return options?.signal ? { signal: options.signal } : undefined;
}

export class ElasticsearchSearchBackend implements SearchBackend {
  readonly vendor = "elasticsearch";

  constructor(
    private readonly client: Client,
    private readonly options: { indexPrefix: string | null; refreshOnWrite: boolean },
  ) {}

  indexName(domain: SearchDomain): string {
    return resolveIndexName(domain, this.options.indexPrefix);
  }

  async index(
    domain: SearchDomain,
    id: string,
    body: Record<string, unknown>,
    options?: SearchBackendCallOptions,
  ): Promise<void> {
    await this.client.index(
      {
        index: this.indexName(domain),
        id,
        document: body,
        ...(this.options.refreshOnWrite ? { refresh: "wait_for" as const } : {}),
      },
      toTransportOptions(options),
    );
  }

  async search(
    request: StructuredRequest,
    options?: SearchBackendCallOptions,
  ): Promise<SearchBackendHit[]> {
    const response = await this.client.search<Record<string, unknown>>(
      buildElasticsearchSearchParams(request, this.indexName(request.domain)),
      toTransportOptions(options),
    );
    return toBackendHits(response.hits.hits);
  }

  async ensureIndex(domain: SearchDomain, options: EnsureIndexOptions): Promise<boolean> {
    const index = this.indexName(domain);
    const exists = await this.client.indices.exists({ index });
    if (exists) return false;
    await this.client.indices.create({
      index,
      mappings: buildIndexMappings(domain, options.vectorDimensions),
    });
    return true;
  }
}

export function createElasticsearchClient(config: ElasticsearchConfig): Client {
  const apiKey = config.apiKey?.trim();
  const username = config.username?.trim();
  const password = config.password ?? null;
  const options: ClientOptions = { node: config.node };
  if (apiKey) {
    options.auth = { apiKey };
  } else if (username && password) {
    options.auth = { username, password };
  }
  return new Client(options);
}

export function createElasticsearchSearchBackend(config: ElasticsearchConfig): SearchBackend {
  return new ElasticsearchSearchBackend(createElasticsearchClient(config), {
    indexPrefix: config.indexPrefix ?? null,
    refreshOnWrite: config.refreshOnWrite ?? false,
  });
}
