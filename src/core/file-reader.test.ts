import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as XLSX from "xlsx";
import { readProductsFromFile } from "./file-reader";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "eol-reader-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeFile(name: string, content: string): string {
  const filePath = path.join(tmpDir, name);
  fs.writeFileSync(filePath, content, "utf-8");
  return filePath;
}

describe("readProductsFromFile", () => {
  test("reads one slug per line from a text file, skipping blanks and comments", () => {
    const filePath = writeFile("products.txt", "python\n\n# runtimes\n  nodejs  \r\nubuntu\n");

    expect(readProductsFromFile(filePath)).toEqual(["python", "nodejs", "ubuntu"]);
  });

  test("rejects an empty text file", () => {
    const filePath = writeFile("empty.txt", "\n# nothing\n");

    expect(() => readProductsFromFile(filePath)).toThrow(`File "${filePath}" is empty.`);
  });

  test("finds the product column in a CSV by header name", () => {
    const filePath = writeFile(
      "products.csv",
      "\uFEFFowner,Slug,notes\nteam-a,python,\"runtime, core\"\nteam-b,,missing\nteam-c,postgresql,db\n"
    );

    expect(readProductsFromFile(filePath)).toEqual(["python", "postgresql"]);
  });

  test("uses an explicit column name", () => {
    const filePath = writeFile("products.csv", "product,tool\npython,terraform\nnodejs,kubernetes\n");

    expect(readProductsFromFile(filePath, "TOOL")).toEqual(["terraform", "kubernetes"]);
  });

  test("reports a missing column", () => {
    const filePath = writeFile("products.csv", "a,b\n1,2\n");

    expect(() => readProductsFromFile(filePath)).toThrow("No product column found automatically.");
    expect(() => readProductsFromFile(filePath, "slug")).toThrow('Column "slug" not found.');
  });

  test("reads the first sheet of an XLSX workbook", () => {
    const filePath = path.join(tmpDir, "products.xlsx");
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet([["name", "owner"], ["nginx", "web"], ["redis", "cache"]]),
      "Products"
    );
    fs.writeFileSync(filePath, XLSX.write(wb, { type: "buffer", bookType: "xlsx" }));

    expect(readProductsFromFile(filePath)).toEqual(["nginx", "redis"]);
  });

  test("rejects unsupported extensions", () => {
    const filePath = writeFile("products.yaml", "- python\n");

    expect(() => readProductsFromFile(filePath)).toThrow('Unsupported file type ".yaml".');
  });
});
