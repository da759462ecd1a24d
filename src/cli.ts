#!/usr/bin/env node

/**
 * CLI entry point for page-harvester.
 *
 * Usage:
 *   page-harvester scrape https://example.com https://example.org
 *   page-harvester scrape https://example.com -s headings="h1, h2" --format csv
 *   page-harvester scrape --input urls.txt --analyze summary --provider claude
 *   page-harvester scrape https://example.com --no-save > page.json
 *   page-harvester init
 */

import { Command } from "commander";
import { applyOverrides, DEFAULT_CONFIG_PATH, loadConfig } from "./config/loader.js";
import { ANALYSIS_TYPES, ContentAnalyzer, isAnalysisType, type AnalysisType } from "./core/analyzer.js";
import { getErrorMessage } from "./core/errors.js";
import { harvest } from "./core/harvester.js";
import { createLogger } from "./core/logger.js";
import { collectSelector, initProject, readUrlList } from "./core/project.js";
import { WebScraper } from "./core/scraper.js";
import { formatDuration } from "./core/utils.js";
import { createProvider } from "./providers/index.js";

/** Seconds given on the command line, as milliseconds */
function secondsOption(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value) * 1000;
}

interface ScrapeCommandOptions {
  config?: string;
  input?: string;
  selector: Record<string, string>;
  article: boolean;
  format?: string;
  output?: string;
  name?: string;
  delay?: string;
  timeout?: string;
  retries?: string;
  analyze?: string;
  categories?: string;
  provider?: string;
  model?: string;
  save: boolean;
}

const program = new Command();

program
  .name("page-harvester")
  .description("Fetch web pages, extract structured content, and save it as JSON, CSV or Excel")
  .version("0.1.0");

program
  .command("scrape")
  .description("Scrape one or more URLs")
  .argument("[urls...]", "Page URLs to scrape")
  .option("-c, --config <path>", `Path to config file (default: ${DEFAULT_CONFIG_PATH} if present)`)
  .option("-i, --input <file>", "Read URLs from a file, one per line")
  .option("-s, --selector <name=css>", "Extract a named CSS selector (repeatable)", collectSelector, {})
  .option("--article", "Also extract the readable article as markdown", false)
  .option("-f, --format <format>", "Output format (json|csv|xlsx)")
  .option("-o, --output <dir>", "Output directory")
  .option("-n, --name <name>", "Base name of the output files", "scrape_results")
  .option("--delay <seconds>", "Pause between requests")
  .option("--timeout <seconds>", "Request timeout")
  .option("--retries <count>", "Retries after a failed request")
  .option("-a, --analyze <type>", `Run LLM analysis (${ANALYSIS_TYPES.join("|")})`)
  .option("--categories <list>", "Comma-separated categories to classify into (full analysis)")
  .option("-p, --provider <name>", "Override LLM provider (openai|claude|ollama)")
  .option("-m, --model <model>", "Override LLM model")
  .option("--no-save", "Print results as JSON to stdout instead of writing files")
  .action(async (urlArgs: string[], opts: ScrapeCommandOptions) => {
    try {
      // CLI flags override config file values
      const config = applyOverrides(loadConfig(opts.config), {
        scraping: {
          delayMs: secondsOption(opts.delay),
          timeoutMs: secondsOption(opts.timeout),
          maxRetries: opts.retries,
        },
        provider: {
          name: opts.provider,
          // A new provider without a model falls back to that provider's default
          model: opts.model ?? (opts.provider ? null : undefined),
        },
        output: { format: opts.format, dir: opts.output },
      });
      const logger = createLogger(config.logging.level);

      const urls = [...urlArgs, ...(opts.input ? readUrlList(opts.input) : [])];
      if (urls.length === 0) {
        throw new Error("No URLs given. Pass URLs as arguments or use --input <file>.");
      }

      let analysis: AnalysisType | undefined;
      if (opts.analyze !== undefined) {
        if (!isAnalysisType(opts.analyze)) {
          throw new Error(`Invalid analysis type "${opts.analyze}". Must be one of: ${ANALYSIS_TYPES.join(", ")}`);
        }
        analysis = opts.analyze;
      }

      // AI analysis is optional: without credentials we still scrape
      let analyzer: ContentAnalyzer | null = null;
      if (analysis) {
        try {
          const provider = createProvider(config.provider);
          analyzer = new ContentAnalyzer(provider, logger.child("analyzer"));
          logger.info("AI analysis enabled", { provider: provider.name, model: provider.model });
        } catch (err) {
          logger.warn(`AI analysis unavailable: ${getErrorMessage(err)}`);
        }
      }

      const scraper = new WebScraper(config.scraping, { logger: logger.child("scraper") });
      const startTime = Date.now();

      const result = await harvest(
        urls,
        { scraper, analyzer, logger },
        {
          selectors: opts.selector,
          article: opts.article,
          analysis,
          analyzeOptions: {
            categories: opts.categories?.split(",").map((c) => c.trim()).filter(Boolean),
          },
          output: config.output,
          name: opts.name,
          save: opts.save,
        },
      );

      if (!opts.save) {
        console.log(
          JSON.stringify(
            { pages: result.pages, failures: result.failures, analyses: result.analyses },
            null,
            2,
          ),
        );
      } else {
        console.log(`\nDone in ${formatDuration(Date.now() - startTime)}`);
        console.log(`   Success: ${result.pages.length}/${urls.length}`);
        console.log(`   Errors:  ${result.failures.length}/${urls.length}`);
        if (analyzer) {
          console.log(`   Analyzed: ${result.analyses.length}`);
        }
        for (const file of result.files) {
          console.log(`   Saved:   ${file}`);
        }
      }

      if (result.pages.length === 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      // Print a clean error message without a stack trace for known errors
      console.error(`\nError: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command("init")
  .description(`Create ${DEFAULT_CONFIG_PATH} and the data directories`)
  .option("--force", "Overwrite an existing config file", false)
  .action((opts: { force: boolean }) => {
    const result = initProject(process.cwd(), opts.force);
    for (const dir of result.directories) {
      console.log(`   ${dir}/`);
    }
    if (result.configWritten) {
      console.log(`   ${DEFAULT_CONFIG_PATH}`);
    } else {
      console.log(`   ${DEFAULT_CONFIG_PATH} already exists (use --force to overwrite)`);
    }
  });

// Parse command-line arguments and execute
await program.parseAsync();
