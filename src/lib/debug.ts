/**
 * Namespaced debug output, off unless SEARCH_DEBUG (or DEBUG) lists the
 * namespace. Patterns are comma or space separated; `search:*` enables every
 * `search:` namespace and `*` enables everything.
 * Usage: debugLog("search:cache", "hit", { key });
 */
type DebugPattern = {
  name: string;
  wildcard: boolean;
};

function parsePatterns(raw: string): DebugPattern[] {
  return raw
    .split(/[,\s]+/)
    .filter(Boolean)
    .map((entry) =>
      entry.endsWith("*")
        ? { name: entry.slice(0, -1).replace(/:$/, ""), wildcard: true }
        : { name: entry, wildcard: false },
    );
}

const patterns = parsePatterns(process.env.SEARCH_DEBUG || process.env.DEBUG || "");

export function isDebugEnabled(namespace: string): boolean {
  if (!namespace) return false;
  return patterns.some(({ name, wildcard }) => {
    if (!wildcard) return name === namespace;
    return !name.length || namespace === name || namespace.startsWith(`${name}:`);
  });
}

export function debugLog(namespace: string, ...args: unknown[]): void {
  if (!isDebugEnabled(namespace)) return;
  console.debug(`[${namespace}]`, ...args);
}
