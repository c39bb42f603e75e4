import { loadEnvFiles } from "./lib/env-file";

loadEnvFiles([".env.local", ".env"]);

const { getSearchBackend } = await import("@/config/search-backend");
const { getVectorizer } = await import("@/config/vectorizer");
const { SEARCH_DOMAINS } = await import("@/types/search");

const backend = getSearchBackend();
if (!backend) {
  console.error("Search backend is not configured");
  process.exit(1);
}
if (!backend.ensureIndex) {
  console.error(`Search vendor "${backend.vendor}" manages its indices outside this tool`);
  process.exit(1);
}

const vectorizer = await getVectorizer();
const vectorDimensions = vectorizer?.dimensions ?? null;
if (!vectorizer) {
  console.warn("No vectorizer available; message indices are created without a vector field.");
}

for (const domain of SEARCH_DOMAINS) {
  const created = await backend.ensureIndex(domain, { vectorDimensions });
  console.log(JSON.stringify({ domain, created, vectorDimensions }));
}
