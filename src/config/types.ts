/**
 * Configuration type definitions for page-harvester.
 *
 * These types mirror the structure of harvester.config.yaml. Every field
 * has a default, so an empty (or absent) config file is valid.
 */

/** Supported LLM provider names */
export type ProviderName = "openai" | "claude" | "ollama";

/** Flat file formats the exporter can write */
export type OutputFormat = "json" | "csv" | "xlsx";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** HTTP fetching behaviour */
export interface ScrapingConfig {
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Retries after the first failed attempt (0 = single attempt) */
  maxRetries: number;
  /** Fixed pause between consecutive URLs in milliseconds */
  delayMs: number;
  userAgent: string;
}

/** Which LLM backs the analyzer and how it is called */
export interface ProviderConfig {
  name: ProviderName;
  model: string;
  /** Falls back to the provider's env var when omitted */
  apiKey?: string;
  /** Only used by ollama */
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
}

export interface OutputConfig {
  format: OutputFormat;
  /** Directory results are written to, relative to the working directory */
  dir: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** Top-level configuration object, the full config file shape */
export interface HarvesterConfig {
  scraping: ScrapingConfig;
  provider: ProviderConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}
