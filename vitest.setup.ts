const defaultEnv: Record<string, string> = {
  SEARCH_BACKEND_VENDOR: "elasticsearch",
  ELASTICSEARCH_URL: "http://localhost:9200",
  CACHE_VENDOR: "none",
  VECTORIZER_VENDOR: "tfidf",
};

for (const [key, value] of Object.entries(defaultEnv)) {
  if (!process.env[key]) {
    process.env[key] = value;
  }
}
