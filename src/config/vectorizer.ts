import { fileURLToPath } from "node:url";

import {
  createTfidfVectorizer,
  fitTfidfModelFromFile,
  loadTfidfModel,
  type TfidfModel,
} from "@/adapters/vector/tfidf";
import { createOpenAIVectorizer } from "@/adapters/vector/openai";
import { serverEnv } from "@/lib/env/server";
import type { Vectorizer } from "@/ports/vectorizer";

export const DEFAULT_CORPUS_PATH = fileURLToPath(
  new URL("../../data/vectorizer-corpus.txt", import.meta.url),
);

const configuredVendor = serverEnv.VECTORIZER_VENDOR;

let vectorizerPromise: Promise<Vectorizer | null> | null = null;

async function resolveTfidfModel(): Promise<TfidfModel> {
  if (serverEnv.VECTORIZER_MODEL_PATH) {
    return loadTfidfModel(serverEnv.VECTORIZER_MODEL_PATH);
  }
  const corpusPath = serverEnv.VECTORIZER_CORPUS_PATH ?? DEFAULT_CORPUS_PATH;
  if (!serverEnv.VECTORIZER_CORPUS_PATH) {
    console.warn(
      `No VECTORIZER_MODEL_PATH or VECTORIZER_CORPUS_PATH set; fitting TF-IDF on the sample corpus at ${corpusPath}.`,
    );
  }
  return fitTfidfModelFromFile(corpusPath, { maxFeatures: serverEnv.VECTORIZER_MAX_FEATURES });
}

async function loadVectorizer(): Promise<Vectorizer | null> {
  try {
    switch (configuredVendor) {
      case "openai": {
        const apiKey = serverEnv.OPENAI_API_KEY;
        if (!apiKey) {
          console.warn("OPENAI_API_KEY is not set; semantic search disabled.");
          return null;
        }
        return createOpenAIVectorizer({
          apiKey,
          baseUrl: serverEnv.OPENAI_BASE_URL,
          model: serverEnv.OPENAI_EMBED_MODEL,
          dimensions: serverEnv.OPENAI_EMBED_DIM,
        });
      }
      case "tfidf":
      case "":
        return createTfidfVectorizer(await resolveTfidfModel());
      default:
        console.warn(`Unknown vectorizer vendor "${configuredVendor}". Falling back to TF-IDF.`);
        return createTfidfVectorizer(await resolveTfidfModel());
    }
  } catch (error) {
    console.warn("Vectorizer initialization failed; semantic search disabled.", error);
    return null;
  }
}

export async function getVectorizer(): Promise<Vectorizer | null> {
  if (!vectorizerPromise) {
    vectorizerPromise = loadVectorizer();
  }
  return vectorizerPromise;
}
