import { z } from "zod";

type EnvSource = Record<string, string | undefined>;

const readEnv = (source: EnvSource, key: string, fallbacks: string[] = []): string | undefined => {
  for (const candidate of [key, ...fallbacks]) {
    const raw = source[candidate];
    if (typeof raw !== "string") continue;
    const trimmed = raw.trim();
    if (trimmed.length) return trimmed;
  }
  return undefined;
};

const optionalString = z.string().optional().transform((value) => value ?? null);
const optionalUrl = z
  .string()
  .url()
  .optional()
  .transform((value) => (value ? value.replace(/\/$/, "") : null));

const optionalPositiveInteger = z
  .preprocess(
    (value) => {
      if (typeof value !== "string") return undefined;
      const parsed = Number(value);
      if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
      return Math.floor(parsed);
    },
    z.number().int().positive().optional(),
  )
  .transform((value) => value ?? null);

const optionalBooleanFlag = z
  .preprocess(
    (value) => {
      if (typeof value === "boolean") return value;
      if (typeof value !== "string") return undefined;
      const normalized = value.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) return true;
      if (["0", "false", "no", "off"].includes(normalized)) return false;
      return undefined;
    },
    z.boolean().optional(),
  )
  .transform((value) => value ?? false);

const lowercaseVendor = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value ?? fallback).trim().toLowerCase() || fallback);

const serverEnvSchema = z.object({
  SEARCH_BACKEND_VENDOR: lowercaseVendor("elasticsearch"),
  SEARCH_INDEX_PREFIX: optionalString,
  ELASTICSEARCH_URL: optionalUrl,
  ELASTICSEARCH_API_KEY: optionalString,
  ELASTICSEARCH_USERNAME: optionalString,
  ELASTICSEARCH_PASSWORD: optionalString,
  ELASTICSEARCH_REFRESH_ON_WRITE: optionalBooleanFlag,
  ALGOLIA_APP_ID: optionalString,
  ALGOLIA_API_KEY: optionalString,
  CACHE_VENDOR: lowercaseVendor("upstash"),
  UPSTASH_REDIS_REST_URL: optionalUrl,
  UPSTASH_REDIS_REST_TOKEN: optionalString,
  SEARCH_CACHE_TTL_SECONDS: optionalPositiveInteger,
  VECTORIZER_VENDOR: lowercaseVendor("tfidf"),
  VECTORIZER_MODEL_PATH: optionalString,
  VECTORIZER_CORPUS_PATH: optionalString,
  VECTORIZER_MAX_FEATURES: optionalPositiveInteger,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalUrl,
  OPENAI_EMBED_MODEL: optionalString,
  OPENAI_EMBED_DIM: optionalPositiveInteger,
});

export type ServerEnv = Readonly<z.infer<typeof serverEnvSchema>>;

function collectRawEnv(source: EnvSource) {
  return {
    SEARCH_BACKEND_VENDOR: readEnv(source, "SEARCH_BACKEND_VENDOR", ["SEARCH_VENDOR"]),
    SEARCH_INDEX_PREFIX: readEnv(source, "SEARCH_INDEX_PREFIX", [
      "ELASTICSEARCH_INDEX_PREFIX",
      "ALGOLIA_INDEX_PREFIX",
    ]),
    ELASTICSEARCH_URL: readEnv(source, "ELASTICSEARCH_URL", ["ELASTIC_URL", "ES_URL"]),
    ELASTICSEARCH_API_KEY: readEnv(source, "ELASTICSEARCH_API_KEY", ["ELASTIC_API_KEY"]),
    ELASTICSEARCH_USERNAME: readEnv(source, "ELASTICSEARCH_USERNAME", ["ELASTIC_USERNAME"]),
    ELASTICSEARCH_PASSWORD: readEnv(source, "ELASTICSEARCH_PASSWORD", ["ELASTIC_PASSWORD"]),
    ELASTICSEARCH_REFRESH_ON_WRITE: readEnv(source, "ELASTICSEARCH_REFRESH_ON_WRITE"),
    ALGOLIA_APP_ID: readEnv(source, "ALGOLIA_APP_ID"),
    ALGOLIA_API_KEY: readEnv(source, "ALGOLIA_API_KEY", ["ALGOLIA_ADMIN_KEY"]),
    CACHE_VENDOR: readEnv(source, "CACHE_VENDOR"),
    UPSTASH_REDIS_REST_URL: readEnv(source, "UPSTASH_REDIS_REST_URL"),
    UPSTASH_REDIS_REST_TOKEN: readEnv(source, "UPSTASH_REDIS_REST_TOKEN"),
    SEARCH_CACHE_TTL_SECONDS: readEnv(source, "SEARCH_CACHE_TTL_SECONDS", ["SEARCH_CACHE_TTL"]),
    VECTORIZER_VENDOR: readEnv(source, "VECTORIZER_VENDOR"),
    VECTORIZER_MODEL_PATH: readEnv(source, "VECTORIZER_MODEL_PATH", ["TFIDF_MODEL_PATH"]),
    VECTORIZER_CORPUS_PATH: readEnv(source, "VECTORIZER_CORPUS_PATH", ["TFIDF_CORPUS_PATH"]),
    VECTORIZER_MAX_FEATURES: readEnv(source, "VECTORIZER_MAX_FEATURES"),
    OPENAI_API_KEY: readEnv(source, "OPENAI_API_KEY", ["OPENAI_KEY", "OPENAI_SECRET_KEY"]),
    OPENAI_BASE_URL: readEnv(source, "OPENAI_BASE_URL", ["AI_BASE_URL"]),
    OPENAI_EMBED_MODEL: readEnv(source, "OPENAI_EMBED_MODEL", ["OPENAI_EMBEDDING_MODEL"]),
    OPENAI_EMBED_DIM: readEnv(source, "OPENAI_EMBED_DIM", ["OPENAI_EMBED_DIMENSIONS"]),
  } satisfies Record<string, string | undefined>;
}

export function parseServerEnv(source: EnvSource): ServerEnv {
  const parsed = serverEnvSchema.safeParse(collectRawEnv(source));
  if (!parsed.success) {
    const formattedErrors = parsed.error.flatten();
    const details = Object.entries(formattedErrors.fieldErrors)
      .map(([field, issues]) => `${field}: ${issues?.join(", ") ?? "invalid"}`)
      .join("; ");
    throw new Error(`Invalid server environment configuration: ${details}`);
  }
  return Object.freeze(parsed.data);
}

export const serverEnv = parseServerEnv(process.env);
