import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";

const PRODUCT_COLUMN_NAMES = ["product", "slug", "name", "id"];

/**
 * Read product slugs from a text, CSV or XLSX file.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Optional header name of the product column (CSV/XLSX).
 */
export function readProductsFromFile(filePath: string, columnName?: string): string[] {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === "" || ext === ".txt") {
    return readText(filePath);
  } else if (ext === ".csv") {
    return readCsv(filePath, columnName);
  } else if (ext === ".xlsx" || ext === ".xls") {
    return readXlsx(filePath, columnName);
  } else {
    throw new Error(
      `Unsupported file type "${ext}". Only .txt, .csv and .xlsx/.xls are supported.`
    );
  }
}

// ── Internals ────────────────────────────────────────────────────────────────

function findProductColumn(headers: string[], preferred?: string): number {
  if (preferred) {
    const idx = headers.findIndex(
      (h) => h.trim().toLowerCase() === preferred.trim().toLowerCase()
    );
    if (idx === -1) {
      throw new Error(
        `Column "${preferred}" not found.\n` +
          `   Available headers: ${headers.map((h) => `"${h}"`).join(", ")}`
      );
    }
    return idx;
  }

  for (const name of PRODUCT_COLUMN_NAMES) {
    const idx = headers.findIndex((h) => h.trim().toLowerCase() === name);
    if (idx !== -1) return idx;
  }

  throw new Error(
    `No product column found automatically.\n` +
      `   Headers present: ${headers.map((h) => `"${h}"`).join(", ")}\n` +
      `   Re-run with --column=<name> to specify the correct column.`
  );
}

function readContent(filePath: string): string {
  const raw = fs.readFileSync(filePath, "utf-8");
  // Strip BOM if present
  return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
}

function readText(filePath: string): string[] {
  const products = readContent(filePath)
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l !== "" && !l.startsWith("#"));
  if (products.length === 0) {
    throw new Error(`File "${filePath}" is empty.`);
  }
  return products;
}

/** Minimal CSV row parser: handles quoted fields and "" escaped quotes. */
function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ",") {
        fields.push(current);
        current = "";
      } else {
        current += ch;
      }
    }
  }
  fields.push(current);
  return fields;
}

function readCsv(filePath: string, columnName?: string): string[] {
  const lines = readContent(filePath).split(/\r?\n/).filter((l) => l.trim() !== "");
  if (lines.length === 0) {
    throw new Error(`File "${filePath}" is empty.`);
  }

  const colIdx = findProductColumn(parseCsvRow(lines[0]), columnName);

  const products: string[] = [];
  for (const line of lines.slice(1)) {
    const cell = (parseCsvRow(line)[colIdx] ?? "").trim();
    if (cell) products.push(cell);
  }
  return products;
}

function readXlsx(filePath: string, columnName?: string): string[] {
  const wb = XLSX.read(fs.readFileSync(filePath), { type: "buffer" });
  const sheetName = wb.SheetNames[0];
  const ws = sheetName === undefined ? undefined : wb.Sheets[sheetName];
  if (!ws) {
    throw new Error(`File "${filePath}" has no sheets.`);
  }

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1 });
  if (rows.length === 0) {
    throw new Error(`File "${filePath}" is empty or has no sheet data.`);
  }

  const headers = rows[0].map((h) => String(h ?? ""));
  const colIdx = findProductColumn(headers, columnName);

  const products: string[] = [];
  for (const row of rows.slice(1)) {
    const cell = String(row[colIdx] ?? "").trim();
    if (cell) products.push(cell);
  }
  return products;
}
