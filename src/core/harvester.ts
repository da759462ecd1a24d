/**
 * Harvest orchestrator.
 *
 * This module wires together all the pieces:
 *   1. Scraper fetches and extracts each URL (sequentially, fixed delay)
 *   2. Analyzer (optional) runs LLM analysis over each successful page
 *   3. Exporter writes pages, analyses and failures to flat files
 *
 * It also handles save: false (return results without writing anything).
 */

import type { OutputConfig } from "../config/types.js";
import type { AnalysisReport, AnalysisType, AnalyzeOptions, ContentAnalyzer } from "./analyzer.js";
import { pageToRow, saveResults } from "./exporter.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ScrapeFailure, ScrapeMultipleOptions, ScrapedPage, WebScraper } from "./scraper.js";

export interface HarvestDeps {
  scraper: WebScraper;
  /** Omit to skip analysis even if `analysis` is set */
  analyzer?: ContentAnalyzer | null;
  logger?: Logger;
}

export interface HarvestOptions extends Omit<ScrapeMultipleOptions, "onResult"> {
  /** Run this analysis type on every successful page */
  analysis?: AnalysisType;
  analyzeOptions?: AnalyzeOptions;
  output: OutputConfig;
  /** Base name of the output files; a timestamp is appended */
  name?: string;
  /** When false nothing is written; defaults to true */
  save?: boolean;
  /** Containment root for output files (defaults to cwd) */
  root?: string;
}

/** Result of the full harvest pipeline */
export interface HarvestResult {
  pages: ScrapedPage[];
  failures: ScrapeFailure[];
  analyses: AnalysisReport[];
  /** Paths of every file written, pages first */
  files: string[];
}

/**
 * Run the full harvest pipeline for a list of URLs.
 *
 * @returns Scraped pages, failures, analysis reports and written file paths.
 */
export async function harvest(
  urls: string[],
  deps: HarvestDeps,
  options: HarvestOptions,
): Promise<HarvestResult> {
  const logger = deps.logger ?? silentLogger;
  const { analysis, analyzeOptions, output, name = "scrape_results", save = true, root, ...scrapeOptions } =
    options;

  // Step 1: Scrape every URL, keeping input order
  const results = await deps.scraper.scrapeMultiple(urls, {
    ...scrapeOptions,
    onResult: (result, index, total) => {
      const label = result.success ? "ok" : `failed: ${result.error.error}`;
      logger.info(`[${index + 1}/${total}] ${label}`, {
        url: result.success ? result.data.url : result.error.url,
      });
    },
  });

  const pages: ScrapedPage[] = [];
  const failures: ScrapeFailure[] = [];
  for (const result of results) {
    if (result.success) pages.push(result.data);
    else failures.push(result.error);
  }

  // Step 2: Analyze successful pages, one completion at a time
  const analyses: AnalysisReport[] = [];
  if (analysis && deps.analyzer) {
    for (const page of pages) {
      const report = await deps.analyzer.analyze(page, analysis, analyzeOptions);
      if (report) analyses.push(report);
    }
  }

  // Step 3: Write files (unless save is off)
  const files: string[] = [];
  if (save) {
    const saveOptions = { root };
    files.push(
      saveResults(pages, output.format, name, output.dir, { ...saveOptions, toRow: pageToRow }),
    );
    if (analyses.length > 0) {
      files.push(saveResults(analyses, output.format, `${name}_analysis`, output.dir, saveOptions));
    }
    if (failures.length > 0) {
      files.push(saveResults(failures, output.format, `${name}_errors`, output.dir, saveOptions));
    }
    for (const file of files) {
      logger.info("Results saved", { file });
    }
  }

  return { pages, failures, analyses, files };
}
