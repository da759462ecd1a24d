/**
 * page-harvester library entry point.
 */

export { loadConfig, parseConfig, applyOverrides, interpolateEnvVars, DEFAULT_CONFIG_PATH } from "./config/loader.js";
export type {
  HarvesterConfig,
  ScrapingConfig,
  ProviderConfig,
  OutputConfig,
  LoggingConfig,
  ProviderName,
  OutputFormat,
  LogLevel,
} from "./config/types.js";

export { WebScraper } from "./core/scraper.js";
export type {
  ScrapedPage,
  ScrapeFailure,
  ScrapeResult,
  ScrapeOptions,
  ScrapeMultipleOptions,
  Fetcher,
} from "./core/scraper.js";
export { PageFetcher, validateUrl, DEFAULT_USER_AGENT } from "./core/fetcher.js";
export type { FetchedPage, FetcherOptions } from "./core/fetcher.js";
export {
  parseHtml,
  extractTitle,
  extractText,
  extractLinks,
  extractImages,
  extractFields,
  extractMeta,
  extractArticle,
} from "./core/extractor.js";
export type { ImageInfo, PageMeta, ReadableArticle } from "./core/extractor.js";

export { ContentAnalyzer, ANALYSIS_TYPES, isAnalysisType } from "./core/analyzer.js";
export type { AnalysisReport, AnalysisType, AnalyzeOptions } from "./core/analyzer.js";
export { createProvider, OpenAIProvider, ClaudeProvider, OllamaProvider } from "./providers/index.js";
export type { LLMProvider, CompletionRequest } from "./providers/index.js";

export {
  saveToJson,
  saveToCsv,
  saveToExcel,
  saveResults,
  pageToRow,
  flattenRecord,
} from "./core/exporter.js";
export { harvest } from "./core/harvester.js";
export type { HarvestResult, HarvestOptions } from "./core/harvester.js";

export { createLogger, silentLogger } from "./core/logger.js";
export type { Logger } from "./core/logger.js";
export { withRetry } from "./core/retry.js";
export {
  HttpStatusError,
  InvalidUrlError,
  ConfigError,
  ProviderError,
  getErrorMessage,
} from "./core/errors.js";
export { cleanText, getTimestamp, sleep } from "./core/utils.js";
