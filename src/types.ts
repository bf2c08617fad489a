/** CLI configuration parsed from command-line arguments */
export interface FetchConfig {
  products: string[];
  outputPath: string;
  /** Request timeout in seconds */
  timeoutSeconds: number;
  oneFile: boolean;
  baseUrl: string;
}

/** One release cycle as returned by the API, passed through untouched */
export type CycleRecord = unknown;

/** Lifecycle data for a single successfully fetched product */
export interface ProductResult {
  product: string;
  cycles: CycleRecord[];
}

export type FailureStatus = "not_found" | "rate_limited" | "network_error";

/** Result of fetching a single product: discriminated union */
export type FetchOutcome =
  | { status: "success"; result: ProductResult }
  | { status: FailureStatus; product: string; message: string };

export type FetchFailure = Extract<FetchOutcome, { status: FailureStatus }>;

/** Outcome per product, in input order */
export type BatchReport = Map<string, FetchOutcome>;

/** Statistics printed after a batch completes */
export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  failures: FetchFailure[];
  elapsed: string;
}
