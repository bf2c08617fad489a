import type {
  BatchReport,
  BatchSummary,
  FailureStatus,
  FetchFailure,
  FetchOutcome,
  ProductResult,
} from "./types";
import { formatDuration, runSequentially } from "./core/utils";

/** Process exit codes */
export const EXIT_CODES = {
  success: 0,
  usage: 2,
  partial: 5,
  not_found: 10,
  network_error: 11,
  write_error: 12,
  rate_limited: 13,
} as const;

/**
 * Fetch every product in order, one at a time, recording each outcome.
 * A failed product never stops the batch.
 * @param products - Product slugs, already deduplicated
 * @param fetch - Fetches a single product
 * @param onItemDone - Progress callback after each product
 */
export async function runBatch(
  products: string[],
  fetch: (product: string) => Promise<FetchOutcome>,
  onItemDone?: (completed: number, total: number, product: string, outcome: FetchOutcome) => void
): Promise<BatchReport> {
  const outcomes = await runSequentially(products, fetch, onItemDone);
  const report: BatchReport = new Map();
  products.forEach((product, i) => report.set(product, outcomes[i]));
  return report;
}

export function isFailure(outcome: FetchOutcome): outcome is FetchFailure {
  return outcome.status !== "success";
}

/** Successful results, in input order. */
export function successfulResults(report: BatchReport): ProductResult[] {
  const results: ProductResult[] = [];
  for (const outcome of report.values()) {
    if (outcome.status === "success") results.push(outcome.result);
  }
  return results;
}

export function failures(report: BatchReport): FetchFailure[] {
  return [...report.values()].filter(isFailure);
}

export function summarizeBatch(report: BatchReport, elapsedMs: number): BatchSummary {
  const failed = failures(report);
  return {
    total: report.size,
    succeeded: report.size - failed.length,
    failed: failed.length,
    failures: failed,
    elapsed: formatDuration(elapsedMs),
  };
}

/**
 * Aggregate exit code for a finished batch (write errors excluded).
 *
 * All succeeded → 0. Some succeeded → 5. None succeeded → the code for the
 * failure kind when every product failed the same way, otherwise the
 * network/API error code.
 */
export function exitCodeFor(report: BatchReport): number {
  const failed = failures(report);
  if (failed.length === 0) return EXIT_CODES.success;
  if (failed.length < report.size) return EXIT_CODES.partial;

  const kinds = new Set<FailureStatus>(failed.map((f) => f.status));
  if (kinds.size === 1) {
    const [kind] = kinds;
    return EXIT_CODES[kind];
  }
  return EXIT_CODES.network_error;
}
