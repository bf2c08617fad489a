import type { AxiosInstance } from "axios";
import type { CycleRecord, FetchOutcome } from "./types";
import { getErrorMessage } from "./core/utils";

export const BASE_URL = "https://endoflife.date/api/v1";

/**
 * Build the request URL for a product slug.
 * @param product - Product slug (e.g. "python", "ubuntu", "nodejs")
 * @param baseUrl - API root, without trailing slash
 */
export function buildProductUrl(product: string, baseUrl: string = BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, "")}/products/${encodeURIComponent(product)}`;
}

/**
 * Fetch end-of-life data for a single product.
 * Never throws: every failure is reported as a FetchOutcome.
 * No retries are attempted.
 * @param product - Product slug
 * @param http - Client from createHttpClient, which sets the timeout, the
 *   Accept header and a validateStatus that never rejects
 * @param baseUrl - API root
 */
export async function fetchProduct(
  product: string,
  http: AxiosInstance,
  baseUrl: string = BASE_URL
): Promise<FetchOutcome> {
  const url = buildProductUrl(product, baseUrl);

  let status: number;
  let body: string;
  try {
    const response = await http.get<string>(url, { responseType: "text" });
    status = response.status;
    body = typeof response.data === "string" ? response.data : JSON.stringify(response.data);
  } catch (err) {
    return {
      status: "network_error",
      product,
      message: `Network or API error while requesting ${url}: ${getErrorMessage(err)}`,
    };
  }

  if (status === 404) {
    return {
      status: "not_found",
      product,
      message:
        `Product '${product}' not found on endoflife.date. ` +
        `Check ${baseUrl.replace(/\/+$/, "")}/products for valid product names.`,
    };
  }
  if (status === 429) {
    return {
      status: "rate_limited",
      product,
      message: "Rate limited by endoflife.date (HTTP 429).",
    };
  }
  if (status >= 500) {
    return {
      status: "network_error",
      product,
      message: `Server error ${status} from endoflife.date.`,
    };
  }
  if (status < 200 || status >= 300) {
    return {
      status: "network_error",
      product,
      message: `HTTP ${status} error from endoflife.date.`,
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    return {
      status: "network_error",
      product,
      message: `Invalid JSON received from API: ${getErrorMessage(err)}`,
    };
  }

  const cycles = extractCycles(parsed);
  if (!cycles) {
    return {
      status: "network_error",
      product,
      message: "Unexpected response from API: expected an array of release cycles.",
    };
  }

  return { status: "success", result: { product, cycles } };
}

/**
 * Locate the cycle array in a decoded body.
 * Accepts a bare array or the v1 envelope `{ result: { releases: [...] } }`.
 */
function extractCycles(body: unknown): CycleRecord[] | null {
  if (Array.isArray(body)) return body;
  if (body && typeof body === "object" && "result" in body) {
    const result = body.result;
    if (result && typeof result === "object" && "releases" in result) {
      const releases = result.releases;
      if (Array.isArray(releases)) return releases;
    }
  }
  return null;
}
