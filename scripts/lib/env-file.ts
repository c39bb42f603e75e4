import fs from "node:fs";
import path from "node:path";

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

function unquote(raw: string): string {
  const value = raw.trim();
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  // Unquoted values may carry a trailing comment.
  return value.replace(/\s+#.*$/, "");
}

export function parseEnvFile(contents: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const match = ASSIGNMENT.exec(trimmed);
    const key = match?.[1];
    if (!key) continue;
    entries.set(key, unquote(match[2] ?? ""));
  }
  return entries;
}

/**
 * Loads the given dotenv files in order, relative to the working directory.
 * Variables already present in the environment (or set by an earlier file) win.
 * Returns the files that were found.
 */
export function loadEnvFiles(fileNames: readonly string[]): string[] {
  const loaded: string[] = [];
  for (const fileName of fileNames) {
    const fullPath = path.resolve(process.cwd(), fileName);
    if (!fs.existsSync(fullPath)) continue;
    for (const [key, value] of parseEnvFile(fs.readFileSync(fullPath, "utf8"))) {
      if (process.env[key] === undefined) {
        process.env[key] = value;
      }
    }
    loaded.push(fileName);
  }
  return loaded;
}
