/**
 * Flat-file writers for harvest results: JSON, CSV and Excel.
 *
 * Every writer keeps files inside a root directory (the working directory
 * by default): the filename is reduced to its last path segment and an
 * output directory that resolves outside the root is refused.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as XLSX from "xlsx";
import type { OutputFormat } from "../config/types.js";
import type { ScrapedPage } from "./scraper.js";
import { getTimestamp } from "./utils.js";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

export const DEFAULT_OUTPUT_DIR = "data/processed";

const SHEET_NAME = "results";

/** Longest text an Excel cell may hold */
export const MAX_EXCEL_CELL_LENGTH = 32_767;

const CELL_TRUNCATION_MARKER = "... [truncated]";

const EXTENSIONS: Record<OutputFormat, string> = {
  json: ".json",
  csv: ".csv",
  xlsx: ".xlsx",
};

export type CellValue = string | number | boolean | null;

export type FlatRecord = Record<string, CellValue>;

/**
 * Work out where a file may be written, creating the directory.
 *
 * @throws Error when the filename is empty or the directory escapes `root`.
 */
export function resolveOutputPath(
  filename: string,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  root: string = process.cwd(),
): string {
  const name = path.basename(filename);
  if (!name || name === "." || name === "..") {
    throw new Error(`Invalid output filename: "${filename}"`);
  }

  const rootPath = path.resolve(root);
  const dirPath = path.resolve(rootPath, outputDir);
  const relative = path.relative(rootPath, dirPath);
  if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new Error(`Output directory must be within ${rootPath}: ${outputDir}`);
  }

  fs.mkdirSync(dirPath, { recursive: true });
  return path.join(dirPath, name);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Turn one value into a single spreadsheet cell.
 * Arrays of scalars are joined with "|"; any other structure becomes JSON.
 */
export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (isScalar(value)) return value;
  if (Array.isArray(value) && value.every(isScalar)) return value.join("|");
  return JSON.stringify(value);
}

/** Flatten an object's own properties into cells */
export function flattenRecord(record: object): FlatRecord {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]): [string, CellValue] => [key, toCell(value)]),
  );
}

/**
 * Spreadsheet row for a scraped page: meta and custom fields are lifted to
 * top-level columns, images are reduced to their URLs. A custom field whose
 * name clashes with a built-in column is prefixed with "field_".
 */
export function pageToRow(page: ScrapedPage): FlatRecord {
  const row: FlatRecord = {
    url: page.url,
    final_url: page.finalUrl,
    status_code: page.statusCode,
    title: page.title,
    description: page.meta.description,
    keywords: page.meta.keywords,
    canonical: page.meta.canonical,
    og_image: page.meta.ogImage,
    lang: page.meta.lang,
    text: page.text,
    links: toCell(page.links),
    links_count: page.links.length,
    images: toCell(page.images.map((img) => img.url)),
    images_count: page.images.length,
  };
  if (page.article !== undefined) {
    row.article = page.article?.content ?? null;
  }
  for (const [name, values] of Object.entries(page.fields)) {
    row[name in row ? `field_${name}` : name] = toCell(values);
  }
  row.scraped_at = page.scrapedAt;
  return row;
}

/** Header: every key that appears in any row, in first-seen order */
function collectColumns(rows: FlatRecord[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return Array.from(columns);
}

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 */
function escapeCsv(value: CellValue | undefined): string {
  const str = value == null ? "" : String(value);
  if (/[",\n\r]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** Render rows as CSV text with a BOM and header; "" for no rows */
export function toCsv(rows: FlatRecord[]): string {
  if (rows.length === 0) return "";
  const columns = collectColumns(rows);
  const lines = rows.map((row) => columns.map((col) => escapeCsv(row[col])).join(","));
  return BOM + [columns.map(escapeCsv).join(","), ...lines].join("\n") + "\n";
}

/**
 * Save data as pretty-printed UTF-8 JSON.
 * @returns Absolute path to the written file
 */
export function saveToJson(
  data: unknown,
  filename: string,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  root?: string,
): string {
  const filePath = resolveOutputPath(filename, outputDir, root);
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  return filePath;
}

/**
 * Save rows as CSV. An empty list still creates an (empty) file.
 * @returns Absolute path to the written file
 */
export function saveToCsv(
  rows: object[],
  filename: string,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  root?: string,
): string {
  const filePath = resolveOutputPath(filename, outputDir, root);
  fs.writeFileSync(filePath, toCsv(rows.map(flattenRecord)), "utf-8");
  return filePath;
}

/** Cut string cells that Excel would refuse, keeping a marker at the end */
function fitExcelCells(row: FlatRecord): FlatRecord {
  return Object.fromEntries(
    Object.entries(row).map(([key, value]): [string, CellValue] => [
      key,
      typeof value === "string" && value.length > MAX_EXCEL_CELL_LENGTH
        ? value.slice(0, MAX_EXCEL_CELL_LENGTH - CELL_TRUNCATION_MARKER.length) + CELL_TRUNCATION_MARKER
        : value,
    ]),
  );
}

/**
 * Save rows as a single-sheet .xlsx workbook.
 * Text longer than an Excel cell allows is truncated.
 * @returns Absolute path to the written file
 */
export function saveToExcel(
  rows: object[],
  filename: string,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  root?: string,
): string {
  const filePath = resolveOutputPath(filename, outputDir, root);
  const flat = rows.map((row) => fitExcelCells(flattenRecord(row)));

  const sheet = XLSX.utils.json_to_sheet(flat, { header: collectColumns(flat) });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);

  // Write through fs ourselves: the ESM build of xlsx has no fs access
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  fs.writeFileSync(filePath, buffer);
  return filePath;
}

export interface SaveResultsOptions<T> {
  /** Directory containment root; defaults to the working directory */
  root?: string;
  /** Row mapping for csv/xlsx; JSON always keeps the records as-is */
  toRow?: (record: T) => object;
  /** Fixed timestamp for the filename (mainly for tests) */
  timestamp?: string;
}

/**
 * Write records in the requested format as `<baseName>_<timestamp>.<ext>`.
 * @returns Absolute path to the written file
 */
export function saveResults<T extends object>(
  records: T[],
  format: OutputFormat,
  baseName: string,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  options: SaveResultsOptions<T> = {},
): string {
  const filename = `${baseName}_${options.timestamp ?? getTimestamp()}${EXTENSIONS[format]}`;
  const toRow = options.toRow ?? ((record: T) => record);

  switch (format) {
    case "json":
      return saveToJson(records, filename, outputDir, options.root);
    case "csv":
      return saveToCsv(records.map(toRow), filename, outputDir, options.root);
    case "xlsx":
      return saveToExcel(records.map(toRow), filename, outputDir, options.root);
  }
}
