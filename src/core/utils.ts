import axios, { AxiosError, type AxiosInstance } from "axios";

const USER_AGENT = "eol-fetch/1.0 (+https://endoflife.date)";

/**
 * Create a configured axios instance for JSON API requests.
 * @param timeout - Request timeout in milliseconds
 */
export function createHttpClient(timeout: number): AxiosInstance {
  return axios.create({
    timeout,
    headers: {
      Accept: "application/json",
      "User-Agent": USER_AGENT,
    },
    maxRedirects: 5,
    // Status codes are classified by the caller, never thrown.
    validateStatus: () => true,
  });
}

/**
 * Run an async processor over items strictly one at a time.
 * @param items - Items to process, in order
 * @param processor - Async function to run on each item
 * @param onItemDone - Callback after each item completes
 * @returns Array of results in input order
 */
export async function runSequentially<T, R>(
  items: T[],
  processor: (item: T) => Promise<R>,
  onItemDone?: (completed: number, total: number, item: T, result: R) => void
): Promise<R[]> {
  const results: R[] = [];
  for (const item of items) {
    const result = await processor(item);
    results.push(result);
    onItemDone?.(results.length, items.length, item, result);
  }
  return results;
}

/**
 * Deduplicate strings, preserving order of first occurrence.
 * Surrounding whitespace is trimmed and empty entries dropped.
 */
export function deduplicate(values: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    if (value && !seen.has(value)) {
      seen.add(value);
      unique.push(value);
    }
  }
  return unique;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")
      return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
