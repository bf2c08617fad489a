import * as fs from "fs";
import * as path from "path";
import type { CycleRecord, ProductResult } from "./types";
import { getErrorMessage } from "./core/utils";

/** Default name of the combined file when --output names a directory */
export const COMBINED_FILENAME = "combined-eol.json";

/** Raised when an output file or its directory cannot be written */
export class FileWriteError extends Error {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Failed to write file '${filePath}': ${getErrorMessage(cause)}`);
    this.name = "FileWriteError";
  }
}

/** Where the writer puts its files */
export type OutputTarget =
  | { kind: "directory"; dir: string }
  | { kind: "file"; filePath: string };

/** Filename used for a product in per-file mode. */
export function productFilename(product: string): string {
  return `${product}-eol.json`;
}

/**
 * Decide the output target from the --output value.
 * A path ending in .json is a file, except in per-file mode with several
 * products, where it can only be a directory.
 * @param output - Value of --output
 * @param productCount - Number of products requested
 * @param oneFile - Aggregate mode
 */
export function resolveOutputTarget(
  output: string,
  productCount: number,
  oneFile: boolean
): OutputTarget {
  const isJsonFile = path.extname(output).toLowerCase() === ".json";
  if (oneFile) {
    return {
      kind: "file",
      filePath: isJsonFile ? output : path.join(output, COMBINED_FILENAME),
    };
  }
  if (isJsonFile && productCount === 1) {
    return { kind: "file", filePath: output };
  }
  return { kind: "directory", dir: output };
}

/**
 * Serialize data as indented JSON, creating parent directories as needed.
 * @throws FileWriteError on any filesystem failure
 */
export function writeJson(data: unknown, filePath: string): string {
  try {
    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  } catch (err) {
    throw new FileWriteError(filePath, err);
  }
  return filePath;
}

/**
 * Per-file mode: write each product's raw cycle array to its own file.
 * @returns Written paths in input order
 */
export function exportProductFiles(
  results: ProductResult[],
  target: OutputTarget
): string[] {
  if (target.kind === "file") {
    // Only reachable for a single product with an explicit .json path.
    return results.map((r) => writeJson(r.cycles, target.filePath));
  }
  return results.map((r) =>
    writeJson(r.cycles, path.join(target.dir, productFilename(r.product)))
  );
}

/**
 * Aggregate mode: write one object mapping product → cycle array.
 * Keys follow input order.
 */
export function exportCombined(results: ProductResult[], filePath: string): string {
  const combined: Record<string, CycleRecord[]> = Object.fromEntries(
    results.map((r) => [r.product, r.cycles])
  );
  return writeJson(combined, filePath);
}
