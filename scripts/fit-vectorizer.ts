import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./lib/env-file";

loadEnvFiles([".env.local", ".env"]);

const { fitTfidfModelFromFile, serializeTfidfModel } = await import("@/adapters/vector/tfidf");
const { DEFAULT_CORPUS_PATH } = await import("@/config/vectorizer");
const { serverEnv } = await import("@/lib/env/server");

const corpusPath = process.argv[2] ?? serverEnv.VECTORIZER_CORPUS_PATH ?? DEFAULT_CORPUS_PATH;
const outputPath = process.argv[3] ?? serverEnv.VECTORIZER_MODEL_PATH;
if (!outputPath) {
  console.error("Usage: tsx scripts/fit-vectorizer.ts [corpus.txt] <model.json>");
  process.exit(1);
}

const model = await fitTfidfModelFromFile(corpusPath, {
  maxFeatures: serverEnv.VECTORIZER_MAX_FEATURES,
});
fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
fs.writeFileSync(outputPath, serializeTfidfModel(model));
console.log(
  JSON.stringify({ corpus: corpusPath, model: outputPath, dimensions: model.vocabulary.length }),
);
