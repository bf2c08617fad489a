import type { AxiosInstance } from "axios";
import type { FetchConfig, FetchOutcome } from "./types";
import { BASE_URL, fetchProduct } from "./fetcher";
import {
  FileWriteError,
  exportCombined,
  exportProductFiles,
  resolveOutputTarget,
} from "./exporter";
import {
  EXIT_CODES,
  exitCodeFor,
  successfulResults,
  summarizeBatch,
  runBatch,
} from "./batch";
import { readProductsFromFile } from "./core/file-reader";
import { createHttpClient, deduplicate, getErrorMessage } from "./core/utils";

export const DEFAULTS = {
  outputPath: "Output",
  timeoutSeconds: 15,
  baseUrl: BASE_URL,
} as const;

/** Longest timeout Node timers accept: (2^31 - 1) ms, in whole seconds */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const USAGE = `Usage: eol-fetch <product>... [options]

Fetch end-of-life data from endoflife.date and save it as JSON.

Options:
  -o, --output <path>    Output directory, or .json file (default: ${DEFAULTS.outputPath})
  -t, --timeout <secs>   HTTP timeout in seconds (default: ${DEFAULTS.timeoutSeconds})
      --one-file         Write all products to a single combined file
  -i, --input <file>     Read product slugs from a .txt, .csv or .xlsx file
      --column <name>    Column holding the slugs in a .csv/.xlsx input
      --base-url <url>   API root (default: ${DEFAULTS.baseUrl})
  -h, --help             Show this help

Examples:
  eol-fetch python
  eol-fetch python nodejs ubuntu -o eol --one-file`;

/** Raised for invalid or missing command-line arguments */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  products: string[];
  output?: string;
  timeout?: string;
  oneFile: boolean;
  inputFile?: string;
  column?: string;
  baseUrl?: string;
  help: boolean;
}

type ValueOption = "output" | "timeout" | "inputFile" | "column" | "baseUrl";

/** Flags that take a value, keyed by every alias */
const VALUE_FLAGS: Record<string, ValueOption | undefined> = {
  "-o": "output",
  "--output": "output",
  "-t": "timeout",
  "--timeout": "timeout",
  "-i": "inputFile",
  "--input": "inputFile",
  "--column": "column",
  "--base-url": "baseUrl",
};

/**
 * Parse CLI arguments.
 * Value flags accept both `--flag value` and `--flag=value`.
 * Everything that is not a flag is a product slug.
 */
export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { products: [], oneFile: false, help: false };
  const values: Partial<Record<ValueOption, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") { opts.help = true; continue; }
    if (arg === "--one-file") { opts.oneFile = true; continue; }
    if (arg === "--") {
      opts.products.push(...argv.slice(i + 1));
      break;
    }

    const eqIdx = arg.indexOf("=");
    const flag = arg.startsWith("--") && eqIdx !== -1 ? arg.slice(0, eqIdx) : arg;
    const key = VALUE_FLAGS[flag];
    if (key) {
      let value: string | undefined;
      if (flag !== arg) {
        value = arg.slice(eqIdx + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined || value === "") {
        throw new UsageError(`Option ${flag} requires a value.`);
      }
      values[key] = value;
      continue;
    }

    if (arg.startsWith("-") && arg.length > 1) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    opts.products.push(arg);
  }

  return {
    ...opts,
    output: values.output,
    timeout: values.timeout,
    inputFile: values.inputFile,
    column: values.column,
    baseUrl: values.baseUrl,
  };
}

/**
 * Turn parsed options into a FetchConfig, reading the input file if given.
 * @throws UsageError when no products remain or a value is invalid
 */
export function resolveConfig(opts: CliOptions): FetchConfig {
  let timeoutSeconds: number = DEFAULTS.timeoutSeconds;
  if (opts.timeout !== undefined) {
    timeoutSeconds = Number(opts.timeout);
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new UsageError(`Invalid timeout "${opts.timeout}": expected a positive number of seconds.`);
    }
    if (timeoutSeconds > MAX_TIMEOUT_SECONDS) {
      throw new UsageError(`Invalid timeout "${opts.timeout}": at most ${MAX_TIMEOUT_SECONDS} seconds.`);
    }
  }

  const fromFile: string[] = [];
  if (opts.inputFile) {
    try {
      fromFile.push(...readProductsFromFile(opts.inputFile, opts.column));
    } catch (err) {
      throw new UsageError(`Could not read products from ${opts.inputFile}: ${getErrorMessage(err)}`);
    }
  }

  const products = deduplicate([...opts.products, ...fromFile]);
  if (products.length === 0) {
    throw new UsageError("No product given.");
  }

  return {
    products,
    outputPath: opts.output ?? DEFAULTS.outputPath,
    timeoutSeconds,
    oneFile: opts.oneFile,
    baseUrl: opts.baseUrl ?? DEFAULTS.baseUrl,
  };
}

export interface RunDeps {
  createHttpClient?: (timeoutMs: number) => AxiosInstance;
}

function statusLine(outcome: FetchOutcome): string {
  if (outcome.status === "success") {
    const n = outcome.result.cycles.length;
    return `✓ ${outcome.result.product} (${n} cycle${n === 1 ? "" : "s"})`;
  }
  return `✗ ${outcome.product}: ${outcome.message}`;
}

/**
 * Execute one invocation of the tool.
 * @param argv - Arguments after the executable and script name
 * @returns Process exit code
 */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  let config: FetchConfig;
  try {
    const opts = parseArgs(argv);
    if (opts.help) {
      console.log(USAGE);
      return EXIT_CODES.success;
    }
    config = resolveConfig(opts);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error("Run with --help for usage.");
      return EXIT_CODES.usage;
    }
    throw err;
  }

  const http = (deps.createHttpClient ?? createHttpClient)(config.timeoutSeconds * 1000);
  const total = config.products.length;

  // ── Step 1: Fetch ─────────────────────────────────────────────────
  console.log(`Step 1: Fetching ${total} product${total === 1 ? "" : "s"} from ${config.baseUrl}...`);
  const startTime = Date.now();

  const report = await runBatch(
    config.products,
    (product) => fetchProduct(product, http, config.baseUrl),
    (completed, count, _product, outcome) => {
      console.log(`   [${completed}/${count}]  ${statusLine(outcome)}`);
    }
  );

  const summary = summarizeBatch(report, Date.now() - startTime);
  const results = successfulResults(report);

  // ── Step 2: Export ────────────────────────────────────────────────
  if (results.length > 0) {
    console.log("\nStep 2: Exporting...");
    const target = resolveOutputTarget(config.outputPath, total, config.oneFile);
    try {
      if (config.oneFile && target.kind === "file") {
        const filePath = exportCombined(results, target.filePath);
        console.log(`   ${filePath} (${results.length} products)`);
      } else {
        const paths = exportProductFiles(results, target);
        paths.forEach((p, i) => console.log(`   ${p} (${results[i].product})`));
      }
    } catch (err) {
      if (err instanceof FileWriteError) {
        console.error(`Error: ${err.message}`);
        return EXIT_CODES.write_error;
      }
      throw err;
    }
  } else {
    console.log("\nNothing to export.");
  }

  if (summary.failures.length > 0) {
    console.error(`\n   Failed products (${summary.failed}):`);
    for (const f of summary.failures) {
      console.error(`     ✗ ${f.product}: ${f.message}`);
    }
  }

  // ── Done ──────────────────────────────────────────────────────────
  console.log(`\nDone in ${summary.elapsed}`);
  console.log(`   Success: ${summary.succeeded}/${summary.total}`);
  console.log(`   Errors:  ${summary.failed}/${summary.total}`);

  return exitCodeFor(report);
}
