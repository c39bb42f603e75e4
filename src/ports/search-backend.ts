import type { FilterValue, SearchDomain } from "@/types/search";

export type FieldBoost = {
  field: string;
  boost: number;
};

export type TextMatchClause = {
  kind: "match";
  field: string;
  query: string;
};

export type MultiFieldMatchClause = {
  kind: "multi_match";
  query: string;
  fields: FieldBoost[];
  /** Treat the last query term as a prefix (typeahead matching). */
  prefix: boolean;
};

export type VectorSimilarityClause = {
  kind: "vector_similarity";
  field: string;
  vector: number[];
  /** Added to the cosine similarity so scores are non-negative. */
  offset: number;
  /** Lexical clause limiting the candidates; null scores every document with a vector. */
  candidates: TextMatchClause | null;
};

export type MatchClause = TextMatchClause | MultiFieldMatchClause | VectorSimilarityClause;

export type TermFilter = {
  kind: "term";
  field: string;
  value: FilterValue;
};

export type SortSpec = {
  field: string;
  order: "asc" | "desc";
};

export type StructuredRequest = {
  domain: SearchDomain;
  match: MatchClause[];
  filter: TermFilter[];
  sort: SortSpec[];
  size: number;
};

export type SearchBackendHit = {
  id: string;
  score: number | null;
  source: Record<string, unknown>;
};

export type SearchBackendCallOptions = {
  signal?: AbortSignal;
};

export type EnsureIndexOptions = {
  vectorDimensions: number | null;
};

/** Thrown by backends for requests they can never serve, such as vector clauses on a lexical-only vendor. */
export class UnsupportedSearchRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedSearchRequestError";
  }
}

export interface SearchBackend {
  readonly vendor: string;
  index(
    domain: SearchDomain,
    id: string,
    body: Record<string, unknown>,
    options?: SearchBackendCallOptions,
  ): Promise<void>;
  search(request: StructuredRequest, options?: SearchBackendCallOptions): Promise<SearchBackendHit[]>;
  /** Resolves true when the call created or reconfigured the index. */
  ensureIndex?(domain: SearchDomain, options: EnsureIndexOptions): Promise<boolean>;
}
