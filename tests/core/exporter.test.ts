/**
 * Tests for the result exporters.
 *
 * Files are written under a fresh temp directory used as the containment
 * root, and read back to check their exact contents.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as XLSX from "xlsx";
import {
  MAX_EXCEL_CELL_LENGTH,
  flattenRecord,
  pageToRow,
  resolveOutputPath,
  saveResults,
  saveToCsv,
  saveToExcel,
  saveToJson,
  toCell,
  toCsv,
} from "../../src/core/exporter.js";
import type { ScrapedPage } from "../../src/core/scraper.js";

const page: ScrapedPage = {
  url: "https://example.com/a",
  finalUrl: "https://example.com/a/",
  statusCode: 200,
  title: "Page A",
  text: "Hello, world",
  meta: { description: "About A", keywords: "", canonical: "", ogImage: "", lang: "en" },
  links: ["https://example.com/b", "https://example.com/c"],
  images: [{ url: "https://example.com/logo.png", alt: "Logo", title: "" }],
  fields: { prices: ["$1", "$2"], title: ["Heading"] },
  scrapedAt: "2024-01-02T03:04:05.000Z",
};

describe("toCell", () => {
  it("should keep scalars and join scalar arrays", () => {
    expect(toCell("x")).toBe("x");
    expect(toCell(3)).toBe(3);
    expect(toCell(false)).toBe(false);
    expect(toCell(["a", "b", 1])).toBe("a|b|1");
  });

  it("should serialize structures and nullify missing values", () => {
    expect(toCell({ k: 1 })).toBe('{"k":1}');
    expect(toCell([{ x: 1 }])).toBe('[{"x":1}]');
    expect(toCell(null)).toBeNull();
    expect(toCell(undefined)).toBeNull();
  });
});

describe("flattenRecord", () => {
  it("should convert each property to a cell", () => {
    expect(flattenRecord({ url: "u", statusCode: null, tags: ["a", "b"] })).toEqual({
      url: "u",
      statusCode: null,
      tags: "a|b",
    });
  });
});

describe("pageToRow", () => {
  it("should lift meta and fields to columns and prefix clashing field names", () => {
    expect(pageToRow(page)).toEqual({
      url: "https://example.com/a",
      final_url: "https://example.com/a/",
      status_code: 200,
      title: "Page A",
      description: "About A",
      keywords: "",
      canonical: "",
      og_image: "",
      lang: "en",
      text: "Hello, world",
      links: "https://example.com/b|https://example.com/c",
      links_count: 2,
      images: "https://example.com/logo.png",
      images_count: 1,
      prices: "$1|$2",
      field_title: "Heading",
      scraped_at: "2024-01-02T03:04:05.000Z",
    });
  });

  it("should include the article column only when an article was requested", () => {
    expect(pageToRow(page)).not.toHaveProperty("article");
    expect(pageToRow({ ...page, article: null }).article).toBeNull();
  });
});

describe("toCsv", () => {
  it("should write a BOM, a union header and escaped cells", () => {
    const csv = toCsv([
      { a: 1, b: "x,y" },
      { a: 2, c: 'say "hi"' },
    ]);

    expect(csv).toBe('\uFEFFa,b,c\n1,"x,y",\n2,,"say ""hi"""\n');
  });

  it("should return an empty string for no rows", () => {
    expect(toCsv([])).toBe("");
  });
});

describe("file writers", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "harvester-export-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should create the output directory inside the root", () => {
    const file = resolveOutputPath("out.json", "nested/dir", root);

    expect(file).toBe(join(root, "nested", "dir", "out.json"));
    expect(existsSync(join(root, "nested", "dir"))).toBe(true);
  });

  it("should strip directories from the filename", () => {
    expect(resolveOutputPath("../../escape.json", "out", root)).toBe(join(root, "out", "escape.json"));
  });

  it("should refuse an output directory outside the root", () => {
    expect(() => resolveOutputPath("x.json", "../elsewhere", root)).toThrow("Output directory must be within");
  });

  it("should save pretty-printed JSON", () => {
    const file = saveToJson([{ url: "https://example.com" }], "pages.json", "out", root);

    expect(readFileSync(file, "utf-8")).toBe('[\n  {\n    "url": "https://example.com"\n  }\n]\n');
  });

  it("should save flattened CSV rows", () => {
    const file = saveToCsv([{ url: "https://example.com", tags: ["a", "b"] }], "rows.csv", "out", root);

    expect(readFileSync(file, "utf-8")).toBe("\uFEFFurl,tags\nhttps://example.com,a|b\n");
  });

  it("should create an empty CSV file for no rows", () => {
    const file = saveToCsv([], "empty.csv", "out", root);

    expect(readFileSync(file, "utf-8")).toBe("");
  });

  it("should save an Excel workbook with one results sheet", () => {
    const file = saveToExcel(
      [
        { url: "https://example.com/a", status: 200 },
        { url: "https://example.com/b", status: 404, error: "Not Found" },
      ],
      "rows.xlsx",
      "out",
      root,
    );

    const workbook = XLSX.read(readFileSync(file), { type: "buffer" });
    expect(workbook.SheetNames).toEqual(["results"]);
    const sheet = workbook.Sheets["results"];
    expect(sheet).toBeDefined();
    if (!sheet) return;
    expect(XLSX.utils.sheet_to_json(sheet)).toEqual([
      { url: "https://example.com/a", status: 200 },
      { url: "https://example.com/b", status: 404, error: "Not Found" },
    ]);
  });

  it("should truncate text longer than an Excel cell allows", () => {
    const longText = "word ".repeat(8_000);
    const file = saveToExcel([{ url: "https://example.com/long", text: longText }], "big.xlsx", "out", root);

    const workbook = XLSX.read(readFileSync(file), { type: "buffer" });
    const sheet = workbook.Sheets["results"];
    expect(sheet).toBeDefined();
    if (!sheet) return;
    const rows = XLSX.utils.sheet_to_json<{ url: string; text: string }>(sheet);
    expect(rows).toHaveLength(1);
    expect(rows[0]?.url).toBe("https://example.com/long");
    expect(rows[0]?.text).toHaveLength(MAX_EXCEL_CELL_LENGTH);
    expect(rows[0]?.text.endsWith("... [truncated]")).toBe(true);
    expect(rows[0]?.text.startsWith("word word ")).toBe(true);
  });

  it("should name files with the base name and timestamp", () => {
    const file = saveResults([page], "csv", "scrape_results", "out", {
      root,
      toRow: pageToRow,
      timestamp: "20240102_030405",
    });

    expect(file).toBe(join(root, "out", "scrape_results_20240102_030405.csv"));
    const [header] = readFileSync(file, "utf-8").split("\n");
    expect(header).toBe(
      "\uFEFFurl,final_url,status_code,title,description,keywords,canonical,og_image,lang,text,links,links_count,images,images_count,prices,field_title,scraped_at",
    );
  });

  it("should keep records unflattened in JSON output", () => {
    const file = saveResults([page], "json", "pages", "out", { root, timestamp: "20240102_030405" });

    expect(file.endsWith("pages_20240102_030405.json")).toBe(true);
    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual([page]);
  });
});
