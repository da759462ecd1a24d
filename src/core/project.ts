/**
 * Command-line helpers: option parsing, URL lists and project scaffolding.
 *
 * Kept out of cli.ts so they can be used without parsing process.argv.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { InvalidArgumentError } from "commander";
import { DEFAULT_CONFIG_PATH } from "../config/loader.js";

export const PROJECT_DIRECTORIES = ["data/raw", "data/processed", "logs"];

export const SAMPLE_CONFIG = `# page-harvester configuration
# Values may reference environment variables as \${VAR_NAME}.

scraping:
  timeoutMs: 30000
  maxRetries: 2         # retries after the first attempt
  delayMs: 1000

provider:
  name: openai          # openai | claude | ollama
  model: gpt-4o-mini
  apiKey: \${OPENAI_API_KEY}

output:
  format: json          # json | csv | xlsx
  dir: data/processed

logging:
  level: info           # debug | info | warn | error
`;

/** Collect repeated `-s name=css` flags into one selector map */
export function collectSelector(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf("=");
  const name = eq > 0 ? value.slice(0, eq).trim() : "";
  const selector = eq > 0 ? value.slice(eq + 1).trim() : "";
  if (!name || !selector) {
    throw new InvalidArgumentError(`Expected name=css-selector, got "${value}".`);
  }
  return { ...previous, [name]: selector };
}

/** One URL per line; blank lines and # comments are ignored */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export function readUrlList(filePath: string): string[] {
  return parseUrlList(readFileSync(filePath, "utf-8"));
}

export interface InitResult {
  /** Directories ensured, relative to the root */
  directories: string[];
  configPath: string;
  /** False when an existing config was left in place */
  configWritten: boolean;
}

/**
 * Create the data directories (each with a .gitkeep) and a sample config.
 * An existing config file is only replaced when `force` is set.
 */
export function initProject(root: string = process.cwd(), force = false): InitResult {
  const base = resolve(root);
  for (const dir of PROJECT_DIRECTORIES) {
    const dirPath = join(base, dir);
    mkdirSync(dirPath, { recursive: true });
    const keep = join(dirPath, ".gitkeep");
    if (!existsSync(keep)) writeFileSync(keep, "");
  }

  const configPath = join(base, DEFAULT_CONFIG_PATH);
  const configWritten = force || !existsSync(configPath);
  if (configWritten) {
    writeFileSync(configPath, SAMPLE_CONFIG, "utf-8");
  }
  return { directories: [...PROJECT_DIRECTORIES], configPath, configWritten };
}
