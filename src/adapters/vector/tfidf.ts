import { readFile } from "node:fs/promises";

import { z } from "zod";

import { VectorizationError, type Vectorizer } from "@/ports/vectorizer";

export type TfidfModel = {
  version: 1;
  vocabulary: string[];
  idf: number[];
};

export type TfidfFitOptions = {
  maxFeatures?: number | null;
  minDocumentFrequency?: number | null;
};

export const DEFAULT_TFIDF_MAX_FEATURES = 4096;

const TOKEN_PATTERN = /[\p{L}\p{N}]{2,}/gu;

const tfidfModelSchema = z
  .object({
    version: z.literal(1),
    vocabulary: z.array(z.string().min(1)).min(1),
    idf: z.array(z.number().finite().positive()).min(1),
  })
  .refine((model) => model.vocabulary.length === model.idf.length, {
    message: "vocabulary and idf must have the same length",
  })
  .refine((model) => new Set(model.vocabulary).size === model.vocabulary.length, {
    message: "vocabulary terms must be unique",
  });

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

function compareTerms(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Fits a vocabulary and smoothed idf weights once over a corpus. The result is
 * meant to be stored and reused; refitting per query would make every query
 * vector incomparable with the indexed ones.
 */
export function fitTfidfModel(corpus: readonly string[], options: TfidfFitOptions = {}): TfidfModel {
  const documents = corpus.map((entry) => tokenize(entry)).filter((tokens) => tokens.length > 0);
  if (!documents.length) {
    throw new Error("Cannot fit a TF-IDF model on an empty corpus");
  }

  const documentFrequency = new Map<string, number>();
  const totalFrequency = new Map<string, number>();
  for (const tokens of documents) {
    for (const token of tokens) {
      totalFrequency.set(token, (totalFrequency.get(token) ?? 0) + 1);
    }
    for (const token of new Set(tokens)) {
      documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
    }
  }

  const minDf = Math.max(1, options.minDocumentFrequency ?? 1);
  let terms = Array.from(documentFrequency.entries())
    .filter(([, df]) => df >= minDf)
    .map(([term]) => term);

  const maxFeatures = options.maxFeatures ?? DEFAULT_TFIDF_MAX_FEATURES;
  if (maxFeatures > 0 && terms.length > maxFeatures) {
    terms = terms
      .sort((a, b) => (totalFrequency.get(b) ?? 0) - (totalFrequency.get(a) ?? 0) || compareTerms(a, b))
      .slice(0, maxFeatures);
  }

  const vocabulary = terms.sort(compareTerms);
  if (!vocabulary.length) {
    throw new Error("TF-IDF fit produced an empty vocabulary");
  }

  const documentCount = documents.length;
  const idf = vocabulary.map((term) => {
    const df = documentFrequency.get(term) ?? 0;
    return Math.log((1 + documentCount) / (1 + df)) + 1;
  });

  return { version: 1, vocabulary, idf };
}

export function parseTfidfModel(value: unknown): TfidfModel {
  const parsed = tfidfModelSchema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Invalid TF-IDF model: ${details}`);
  }
  return parsed.data;
}

export function serializeTfidfModel(model: TfidfModel): string {
  return JSON.stringify(model);
}

class TfidfVectorizer implements Vectorizer {
  readonly vendor = "tfidf";
  readonly dimensions: number;
  private readonly termIndex: Map<string, number>;

  constructor(private readonly model: TfidfModel) {
    this.dimensions = model.vocabulary.length;
    this.termIndex = new Map(model.vocabulary.map((term, index) => [term, index]));
  }

  async vectorize(text: string): Promise<number[]> {
    if (!text.trim().length) {
      throw new VectorizationError("empty_text", "Cannot vectorize empty text");
    }

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const index = this.termIndex.get(token);
      if (index === undefined) continue;
      vector[index] = (vector[index] ?? 0) + 1;
    }

    let sumOfSquares = 0;
    for (let index = 0; index < vector.length; index += 1) {
      const weighted = (vector[index] ?? 0) * (this.model.idf[index] ?? 0);
      vector[index] = weighted;
      sumOfSquares += weighted * weighted;
    }

    if (sumOfSquares === 0) {
      throw new VectorizationError("zero_vector", "Text shares no terms with the fitted vocabulary");
    }
    const norm = Math.sqrt(sumOfSquares);
    return vector.map((value) => value / norm);
  }
}

export function createTfidfVectorizer(model: TfidfModel): Vectorizer {
  return new TfidfVectorizer(parseTfidfModel(model));
}

/** One document per line; blank lines and lines starting with `#` are skipped. */
export function parseCorpus(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function loadTfidfModel(path: string): Promise<TfidfModel> {
  const contents = await readFile(path, "utf8");
  return parseTfidfModel(JSON.parse(contents));
}

export async function fitTfidfModelFromFile(
  path: string,
  options: TfidfFitOptions = {},
): Promise<TfidfModel> {
  const contents = await readFile(path, "utf8");
  return fitTfidfModel(parseCorpus(contents), options);
}
