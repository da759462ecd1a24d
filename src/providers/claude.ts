/**
 * Claude (Anthropic) provider implementation.
 *
 * Uses the official Anthropic SDK via the Messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import { ProviderError } from "../core/errors.js";
import type { CompletionDefaults, CompletionRequest, LLMProvider } from "./base.js";
import { DEFAULT_COMPLETION } from "./base.js";

export class ClaudeProvider implements LLMProvider {
  readonly name = "claude";
  readonly model: string;
  private client: Anthropic;
  private defaults: CompletionDefaults;

  /**
   * @param model - The Anthropic model ID (e.g., "claude-3-5-haiku-latest").
   * @param apiKey - Anthropic API key. Falls back to the ANTHROPIC_API_KEY env var.
   * @throws ProviderError when no API key is available.
   */
  constructor(model: string, apiKey?: string, defaults: CompletionDefaults = DEFAULT_COMPLETION) {
    const key = apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!key) {
      throw new ProviderError("claude", "Anthropic API key not configured. Set ANTHROPIC_API_KEY.");
    }
    this.model = model;
    this.defaults = defaults;
    this.client = new Anthropic({ apiKey: key });
  }

  async complete(request: CompletionRequest): Promise<string> {
    // Anthropic's API has a dedicated `system` parameter (not a message role)
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: request.maxTokens ?? this.defaults.maxTokens,
      temperature: request.temperature ?? this.defaults.temperature,
      ...(request.system ? { system: request.system } : {}),
      messages: [{ role: "user", content: request.prompt }],
    });

    // The response content is an array of content blocks; we expect a single text block
    const block = response.content[0];
    if (!block || block.type !== "text" || !block.text.trim()) {
      throw new ProviderError(this.name, "Claude returned an empty or non-text response");
    }

    return block.text.trim();
  }
}
