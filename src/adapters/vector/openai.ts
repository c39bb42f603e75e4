import { z } from "zod";

import { type OpenAIConfig, type OpenAIJsonResult, postOpenAIJson } from "@/adapters/ai/openai/server";
import { VectorizationError, type Vectorizer } from "@/ports/vectorizer";

const DEFAULT_EMBED_MODEL = "text-embedding-3-small";
const MAX_INPUT_CHARACTERS = 8000;

export type OpenAIVectorizerConfig = OpenAIConfig & {
  model?: string | null;
  dimensions?: number | null;
};

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
      }),
    )
    .min(1),
});

function normalizeEmbedModel(value: string | null | undefined): string {
  const trimmed = (value ?? "").trim();
  return trimmed.length ? trimmed : DEFAULT_EMBED_MODEL;
}

export function inferEmbeddingDimensions(model: string): number | null {
  const normalized = model.toLowerCase();
  if (normalized.includes("text-embedding-3-large")) return 3072;
  if (normalized.includes("text-embedding-3-small")) return 1536;
  if (normalized.includes("text-embedding-ada-002")) return 1536;
  return null;
}

class OpenAIVectorizer implements Vectorizer {
  readonly vendor = "openai";
  readonly dimensions: number;
  private readonly model: string;
  private readonly explicitDimensions: boolean;

  constructor(private readonly config: OpenAIVectorizerConfig) {
    this.model = normalizeEmbedModel(config.model);
    const explicit =
      typeof config.dimensions === "number" && Number.isFinite(config.dimensions) && config.dimensions > 0
        ? config.dimensions
        : null;
    const dimensions = explicit ?? inferEmbeddingDimensions(this.model);
    if (!dimensions) {
      throw new Error(`Embedding dimensions for model "${this.model}" must be configured`);
    }
    this.dimensions = dimensions;
    this.explicitDimensions = explicit !== null;
  }

  async vectorize(text: string): Promise<number[]> {
    const input = text.trim().slice(0, MAX_INPUT_CHARACTERS);
    if (!input.length) {
      throw new VectorizationError("empty_text", "Cannot vectorize empty text");
    }
    const body: Record<string, unknown> = {
      model: this.model,
      input,
      encoding_format: "float",
    };
    if (this.explicitDimensions) {
      body.dimensions = this.dimensions;
    }

    let result: OpenAIJsonResult;
    try {
      result = await postOpenAIJson(this.config, "/embeddings", body);
    } catch (error) {
      throw new VectorizationError("upstream", "OpenAI embedding request failed", { cause: error });
    }
    if (!result.ok) {
      console.error("OpenAI embedding error", { status: result.status, body: result.parsedBody });
      throw new VectorizationError("upstream", `OpenAI embedding request failed with ${result.status}`);
    }

    const parsed = embeddingResponseSchema.safeParse(result.parsedBody);
    const embedding = parsed.success ? parsed.data.data[0]?.embedding : undefined;
    if (!embedding) {
      throw new VectorizationError("upstream", "OpenAI embedding response had no embedding");
    }
    if (embedding.length !== this.dimensions) {
      throw new VectorizationError(
        "dimension_mismatch",
        `Embedding has ${embedding.length} dimensions, expected ${this.dimensions}`,
      );
    }
    if (embedding.every((value) => value === 0)) {
      throw new VectorizationError("zero_vector", "OpenAI returned a zero embedding");
    }
    return embedding;
  }
}

export function createOpenAIVectorizer(config: OpenAIVectorizerConfig): Vectorizer {
  return new OpenAIVectorizer(config);
}
