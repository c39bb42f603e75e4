export type OpenAIConfig = {
  apiKey: string;
  baseUrl?: string | null;
};

export type OpenAIJsonResult = {
  ok: boolean;
  status: number;
  parsedBody: unknown;
};

type OpenAIRequestInit = Omit<RequestInit, "headers"> & { headers?: HeadersInit };

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com";

function resolveUrl(config: OpenAIConfig, path: string): string {
  if (path.startsWith("http://") || path.startsWith("https://")) {
    return path;
  }
  const base = (config.baseUrl?.trim() || DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "");
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${base}/v1${normalizedPath}`;
}

export async function fetchOpenAI(
  config: OpenAIConfig,
  path: string,
  init: OpenAIRequestInit = {},
): Promise<Response> {
  const apiKey = config.apiKey.trim();
  if (!apiKey) {
    throw new Error("OpenAI API key is not configured");
  }
  const headers = new Headers(init.headers ?? {});
  if (!headers.has("Authorization")) {
    headers.set("Authorization", `Bearer ${apiKey}`);
  }
  if (init.body && !headers.has("Content-Type")) {
    headers.set("Content-Type", "application/json");
  }
  return fetch(resolveUrl(config, path), { ...init, headers });
}

async function readResponseBody(response: Response): Promise<unknown> {
  const raw = await response.text();
  if (!raw) {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export async function postOpenAIJson(
  config: OpenAIConfig,
  path: string,
  body: unknown,
  init: Omit<OpenAIRequestInit, "body"> = {},
): Promise<OpenAIJsonResult> {
  const payload = typeof body === "string" ? body : JSON.stringify(body);
  const response = await fetchOpenAI(config, path, {
    method: init.method ?? "POST",
    ...init,
    body: payload,
  });
  return {
    ok: response.ok,
    status: response.status,
    parsedBody: await readResponseBody(response),
  };
}
