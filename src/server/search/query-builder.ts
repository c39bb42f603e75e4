import type {
  FieldBoost,
  MatchClause,
  SortSpec,
  StructuredRequest,
  TermFilter,
  TextMatchClause,
} from "@/ports/search-backend";
import type { Vectorizer } from "@/ports/vectorizer";
import type { SearchDomain, SearchIntent, SearchMode } from "@/types/search";

import { MESSAGE_VECTOR_FIELD } from "./documents";
import { SearchServiceError, getErrorSummary } from "./errors";

export const LEXICAL_DEFAULT_LIMIT = 50;
export const SEMANTIC_DEFAULT_LIMIT = 20;
export const MAX_RESULT_LIMIT = 200;
export const SEMANTIC_SCORE_OFFSET = 1;

export type UserFieldBoosts = {
  username: number;
  email: number;
};

export const DEFAULT_USER_FIELD_BOOSTS: UserFieldBoosts = { username: 2, email: 1 };

const TEXT_FIELDS = {
  messages: "content",
  rooms: "name",
} as const;

const ROOM_MEMBERS_FIELD = "members";
const MESSAGE_TIMESTAMP_FIELD = "timestamp";

export type QueryBuilderOptions = {
  vectorizer: Vectorizer | null;
  userFieldBoosts?: Partial<UserFieldBoosts> | null;
};

function invalidIntent(message: string, data?: Record<string, unknown>): SearchServiceError {
  return new SearchServiceError("invalid_intent", message, data);
}

function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Rejects malformed intents before any I/O happens. Shared by the builder and
 * the orchestrator, which validates ahead of the cache lookup.
 */
export function assertValidIntent(domain: SearchDomain, intent: SearchIntent, mode: SearchMode): void {
  const query = typeof intent.query === "string" ? intent.query : "";
  const hasQuery = hasText(query);
  const hasContext = hasText(intent.context);

  if (!hasQuery && !hasContext) {
    throw invalidIntent("A search needs a query or a semantic context", { domain, mode });
  }
  if (mode === "lexical" && !hasQuery) {
    throw invalidIntent("Lexical search requires a non-empty query", { domain, mode });
  }
  if (mode === "semantic" && !hasContext) {
    throw invalidIntent("Semantic search requires a non-empty context", { domain, mode });
  }
  if (mode === "hybrid" && !hasQuery) {
    throw invalidIntent("Hybrid search requires a non-empty query", { domain, mode });
  }
  if (mode !== "lexical" && domain !== "messages") {
    throw invalidIntent(`${mode} search is only available for messages`, { domain, mode });
  }

  if (intent.limit !== undefined && intent.limit !== null) {
    if (!Number.isInteger(intent.limit) || intent.limit <= 0) {
      throw invalidIntent("Result limit must be a positive integer", { limit: intent.limit });
    }
  }

  if (domain === "rooms" && !hasText(intent.userId)) {
    throw invalidIntent("Room search requires the requesting userId", { domain });
  }

  for (const [field, value] of Object.entries(intent.filters ?? {})) {
    if (!field.trim().length) {
      throw invalidIntent("Filter field names must not be empty", { domain });
    }
    const valid =
      typeof value === "string" ||
      typeof value === "boolean" ||
      (typeof value === "number" && Number.isFinite(value));
    if (!valid) {
      throw invalidIntent(`Filter "${field}" must be a string, number or boolean`, { domain, field });
    }
  }
}

export function resolveResultLimit(intent: SearchIntent, mode: SearchMode): number {
  const fallback = mode === "semantic" ? SEMANTIC_DEFAULT_LIMIT : LEXICAL_DEFAULT_LIMIT;
  const requested = typeof intent.limit === "number" ? intent.limit : fallback;
  return Math.max(1, Math.min(requested, MAX_RESULT_LIMIT));
}

function buildTermFilters(domain: SearchDomain, intent: SearchIntent): TermFilter[] {
  const filters: TermFilter[] = [];
  if (domain === "rooms" && hasText(intent.userId)) {
    // Always first and never replaced: callers only see rooms they belong to.
    filters.push({ kind: "term", field: ROOM_MEMBERS_FIELD, value: intent.userId.trim() });
  }
  const entries = Object.entries(intent.filters ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [field, value] of entries) {
    filters.push({ kind: "term", field, value });
  }
  return filters;
}

function resolveUserBoosts(overrides: Partial<UserFieldBoosts> | null | undefined): FieldBoost[] {
  const merged = { ...DEFAULT_USER_FIELD_BOOSTS, ...(overrides ?? {}) };
  return [
    { field: "username", boost: merged.username },
    { field: "email", boost: merged.email },
  ];
}

function buildLexicalClause(
  domain: SearchDomain,
  query: string,
  options: QueryBuilderOptions,
): MatchClause {
  if (domain === "users") {
    return {
      kind: "multi_match",
      query,
      fields: resolveUserBoosts(options.userFieldBoosts),
      prefix: true,
    };
  }
  return { kind: "match", field: TEXT_FIELDS[domain], query };
}

function resolveSort(domain: SearchDomain, mode: SearchMode): SortSpec[] {
  if (domain === "messages" && mode === "lexical") {
    return [{ field: MESSAGE_TIMESTAMP_FIELD, order: "desc" }];
  }
  return [];
}

async function vectorizeIntent(intent: SearchIntent, vectorizer: Vectorizer | null): Promise<number[]> {
  if (!vectorizer) {
    throw new SearchServiceError("vectorization_failed", "No vectorizer is configured for semantic search");
  }
  const text = [intent.query, intent.context]
    .filter(hasText)
    .map((value) => value.trim())
    .join(" ");
  try {
    return await vectorizer.vectorize(text);
  } catch (error) {
    throw new SearchServiceError(
      "vectorization_failed",
      `Could not vectorize search text: ${getErrorSummary(error)}`,
      { vendor: vectorizer.vendor },
      { cause: error },
    );
  }
}

/**
 * Translates a caller intent into a backend-agnostic request. Deterministic for
 * a given intent and mode; semantic and hybrid modes call the vectorizer
 * exactly once.
 */
export async function buildSearchRequest(
  domain: SearchDomain,
  intent: SearchIntent,
  mode: SearchMode,
  options: QueryBuilderOptions,
): Promise<StructuredRequest> {
  assertValidIntent(domain, intent, mode);

  const size = resolveResultLimit(intent, mode);
  const filter = buildTermFilters(domain, intent);
  const sort = resolveSort(domain, mode);

  if (mode === "lexical") {
    return {
      domain,
      match: [buildLexicalClause(domain, intent.query, options)],
      filter,
      sort,
      size,
    };
  }

  const vector = await vectorizeIntent(intent, options.vectorizer);
  const candidates: TextMatchClause | null =
    mode === "hybrid" ? { kind: "match", field: TEXT_FIELDS.messages, query: intent.query } : null;

  return {
    domain,
    match: [
      {
        kind: "vector_similarity",
        field: MESSAGE_VECTOR_FIELD,
        vector,
        offset: SEMANTIC_SCORE_OFFSET,
        candidates,
      },
    ],
    filter,
    sort,
    size,
  };
}
