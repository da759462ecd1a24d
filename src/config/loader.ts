/**
 * Configuration loader for page-harvester.
 *
 * Settings are layered, later layers winning:
 *   1. built-in defaults
 *   2. environment variables (and a .env file, via dotenv)
 *   3. an optional YAML config file
 *
 * String values in the YAML file may reference env vars with ${VAR_NAME},
 * which keeps secrets out of config files:
 *   apiKey: ${OPENAI_API_KEY}
 */

import { existsSync, readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { DEFAULT_USER_AGENT } from "../core/fetcher.js";
import type { HarvesterConfig, ProviderName } from "./types.js";

// Load .env file into process.env (no-op if .env doesn't exist)
loadDotenv();

export const DEFAULT_CONFIG_PATH = "harvester.config.yaml";

/** Model used when the config names a provider but no model */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-4o-mini",
  claude: "claude-3-5-haiku-latest",
  ollama: "llama3.1",
};

/** Empty strings (e.g. an unset ${VAR}) and YAML nulls mean "not set" */
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value || undefined);

const configSchema = z.object({
  scraping: z
    .object({
      timeoutMs: z.coerce.number().positive().default(30_000),
      maxRetries: z.coerce.number().int().nonnegative().default(2),
      delayMs: z.coerce.number().nonnegative().default(1_000),
      userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    })
    .default({}),
  provider: z
    .object({
      name: z.enum(["openai", "claude", "ollama"]).default("openai"),
      model: optionalString,
      apiKey: optionalString,
      baseUrl: optionalString,
      temperature: z.coerce.number().min(0).max(2).default(0.7),
      maxTokens: z.coerce.number().int().positive().default(2_000),
    })
    .transform((provider) => ({
      ...provider,
      model: provider.model ?? DEFAULT_MODELS[provider.name],
    }))
    .default({}),
  output: z
    .object({
      format: z.enum(["json", "csv", "xlsx"]).default("json"),
      dir: z.string().min(1).default("data/processed"),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    })
    .default({}),
});

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replace all ${VAR_NAME} patterns in a string with their env var values.
 * Unmatched variables are left as empty strings (fail-open for optional vars).
 */
export function interpolateEnvVars(raw: string, env: NodeJS.ProcessEnv = process.env): string {
  return raw.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    return env[varName] ?? "";
  });
}

/** Recursively overlay `override` onto `base`; undefined never overwrites */
function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] =
      isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

/** Seconds from the environment, as milliseconds (NaN fails validation) */
function secondsToMs(value: string | undefined): number | undefined {
  return value ? Number(value) * 1000 : undefined;
}

/**
 * MAX_RETRIES counts every attempt, the first included; the config field
 * counts retries after it.
 */
function attemptsToRetries(value: string | undefined): number | undefined {
  return value ? Math.max(Number(value) - 1, 0) : undefined;
}

/**
 * Map the supported environment variables onto the config shape.
 * Timeouts and delays are given in seconds in the environment.
 */
function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  return {
    scraping: {
      timeoutMs: secondsToMs(env.SCRAPING_TIMEOUT),
      maxRetries: attemptsToRetries(env.MAX_RETRIES),
      delayMs: secondsToMs(env.DELAY_BETWEEN_REQUESTS),
      userAgent: env.USER_AGENT || undefined,
    },
    provider: {
      name: env.LLM_PROVIDER || undefined,
      model: env.LLM_MODEL || undefined,
    },
    output: {
      format: env.OUTPUT_FORMAT || undefined,
      dir: env.OUTPUT_DIR || undefined,
    },
    logging: {
      level: env.LOG_LEVEL || undefined,
    },
  };
}

/** Read the YAML file, interpolate env vars, and return its top-level mapping */
function readConfigFile(configPath: string, env: NodeJS.ProcessEnv): RawConfig {
  const raw = readFileSync(configPath, "utf-8");

  // ${VAR} is substituted in the raw text, before YAML parsing
  const parsed: unknown = parseYaml(interpolateEnvVars(raw, env));

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a YAML mapping`);
  }
  return parsed;
}

/**
 * Validate a raw (merged) config object and fill in defaults.
 *
 * @throws ConfigError listing every invalid field.
 */
export function parseConfig(raw: unknown): HarvesterConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError("Invalid configuration", issues);
  }
  return result.data;
}

/**
 * Overlay partial settings (e.g. from CLI flags) on a loaded config and
 * validate the result again.
 *
 * @throws ConfigError if an override is invalid.
 */
export function applyOverrides(config: HarvesterConfig, overrides: RawConfig): HarvesterConfig {
  return parseConfig(deepMerge({ ...config }, overrides));
}

/**
 * Load the harvester configuration.
 *
 * @param configPath - Path to a YAML config file. When omitted the default
 *                     harvester.config.yaml is used if it exists.
 * @param env - Environment to read variables from (defaults to process.env).
 * @returns Fully populated and validated configuration.
 * @throws ConfigError if an explicit file is missing or any value is invalid.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): HarvesterConfig {
  let merged = configFromEnv(env);

  const path = configPath ?? DEFAULT_CONFIG_PATH;
  if (existsSync(path)) {
    merged = deepMerge(merged, readConfigFile(path, env));
  } else if (configPath !== undefined) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  // OPENAI_MODEL is honoured for the openai provider when nothing else set a model
  const provider = isRecord(merged.provider) ? merged.provider : {};
  const providerName = provider.name ?? "openai";
  if (!provider.model && providerName === "openai" && env.OPENAI_MODEL) {
    merged = deepMerge(merged, { provider: { model: env.OPENAI_MODEL } });
  }

  return parseConfig(merged);
}
