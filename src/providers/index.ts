/**
 * Provider factory: instantiates the configured LLM provider.
 *
 * This is the single entry point the rest of the app uses to get a provider.
 * Adding a new provider only requires:
 *   1. Creating a new class that implements LLMProvider
 *   2. Adding a case to the switch statement below
 */

import type { ProviderConfig } from "../config/types.js";
import { ProviderError } from "../core/errors.js";
import type { LLMProvider } from "./base.js";
import { ClaudeProvider } from "./claude.js";
import { OllamaProvider } from "./ollama.js";
import { OpenAIProvider } from "./openai.js";

/**
 * Create an LLM provider from the config's provider section.
 *
 * @throws ProviderError if the provider is unknown or has no credentials.
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  const defaults = { temperature: config.temperature, maxTokens: config.maxTokens };
  switch (config.name) {
    case "openai":
      return new OpenAIProvider(config.model, config.apiKey, defaults);
    case "claude":
      return new ClaudeProvider(config.model, config.apiKey, defaults);
    case "ollama":
      return new OllamaProvider(config.model, config.baseUrl, defaults);
    default:
      // The config type rules this out, but YAML can still carry any string
      throw new ProviderError(String(config.name), `Unknown provider: ${String(config.name)}`);
  }
}

// Re-export base types so consumers can import everything from providers/
export type { LLMProvider, CompletionRequest, CompletionDefaults } from "./base.js";
export { OpenAIProvider } from "./openai.js";
export { ClaudeProvider } from "./claude.js";
export { OllamaProvider } from "./ollama.js";
