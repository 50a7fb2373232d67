import axios, { AxiosError, AxiosInstance } from "axios";
import { NetworkError } from "./errors";
import { sleep } from "./utils";

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.0 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64; rv:133.0) Gecko/20100101 Firefox/133.0",
];

const PAGE_ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

export interface HttpClientOptions {
  /** Per-request timeout in milliseconds */
  timeout: number;
  userAgents?: string[];
}

/**
 * Axios instance with browser-like headers. The User-Agent cycles through
 * the pool, one per request.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const agents = options.userAgents?.length ? options.userAgents : USER_AGENTS;
  let next = 0;

  const client = axios.create({
    timeout: options.timeout,
    maxRedirects: 5,
    headers: {
      Accept: PAGE_ACCEPT,
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
    },
  });

  client.interceptors.request.use((config) => {
    config.headers["User-Agent"] = agents[next % agents.length];
    next++;
    return config;
  });

  return client;
}

/**
 * Run `fn`, making up to `retries` more attempts `delayMs` apart.
 * When every attempt fails the first error is rethrown.
 * @param fn - The async operation to attempt
 * @param retries - Extra attempts after the first
 * @param delayMs - Pause before each extra attempt
 * @returns The first successful result
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  retries = 0,
  delayMs = 1000
): Promise<T> {
  let firstError: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) await sleep(delayMs);
    try {
      return await fn();
    } catch (err) {
      firstError ??= err;
    }
  }
  throw firstError;
}

/**
 * GET a URL as text. Any failure, including a non-2xx status, surfaces as
 * a NetworkError carrying the URL and status.
 * @param http - Client from createHttpClient
 * @param url - Absolute URL to fetch
 * @param accept - Accept header overriding the client's default
 * @param retries - Extra attempts on failure
 * @returns The response body
 */
export async function fetchText(
  http: AxiosInstance,
  url: string,
  accept?: string,
  retries = 0
): Promise<string> {
  const request = () =>
    http.get<string>(url, {
      responseType: "text",
      headers: accept ? { Accept: accept } : undefined,
    });
  try {
    const { data } = await withRetry(request, retries);
    return typeof data === "string" ? data : String(data ?? "");
  } catch (err) {
    throw new NetworkError(getErrorMessage(err), url, getErrorStatus(err), { cause: err });
  }
}

const AXIOS_CODE_MESSAGES: Record<string, string> = {
  ECONNABORTED: "Request timed out",
  ETIMEDOUT: "Request timed out",
  ECONNRESET: "Connection reset by server",
  ECONNREFUSED: "Connection refused",
  ERR_TLS_CERT_ALTNAME_INVALID: "SSL certificate error",
};

/**
 * Readable one-line description of a caught value.
 * @param err - The caught error
 * @returns "HTTP 404: Not Found", "Request timed out", or the error's own message
 */
export function getErrorMessage(err: unknown): string {
  if (!(err instanceof AxiosError)) {
    return err instanceof Error ? err.message : String(err);
  }
  if (err.code === "ENOTFOUND") {
    return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
  }
  const known = err.code ? AXIOS_CODE_MESSAGES[err.code] : undefined;
  if (known) return known;
  if (err.response) {
    return `HTTP ${err.response.status}: ${err.response.statusText || "Error"}`;
  }
  return err.message;
}

/**
 * HTTP status of a failed axios request.
 * @param err - The caught error
 * @returns The status, or null when no response was received
 */
export function getErrorStatus(err: unknown): number | null {
  return err instanceof AxiosError ? err.response?.status ?? null : null;
}
