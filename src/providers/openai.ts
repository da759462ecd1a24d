/**
 * OpenAI provider implementation.
 *
 * Uses the official OpenAI SDK via chat completions.
 * Supports any model available through the OpenAI API (gpt-4o, gpt-4o-mini, etc.).
 */

import OpenAI from "openai";
import { ProviderError } from "../core/errors.js";
import type { CompletionDefaults, CompletionRequest, LLMProvider } from "./base.js";
import { DEFAULT_COMPLETION } from "./base.js";

export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";
  readonly model: string;
  private client: OpenAI;
  private defaults: CompletionDefaults;

  /**
   * @param model - The OpenAI model ID (e.g., "gpt-4o-mini").
   * @param apiKey - OpenAI API key. Falls back to the OPENAI_API_KEY env var.
   * @throws ProviderError when no API key is available.
   */
  constructor(model: string, apiKey?: string, defaults: CompletionDefaults = DEFAULT_COMPLETION) {
    const key = apiKey ?? process.env.OPENAI_API_KEY;
    if (!key) {
      throw new ProviderError("openai", "OpenAI API key not configured. Set OPENAI_API_KEY.");
    }
    this.model = model;
    this.defaults = defaults;
    this.client = new OpenAI({ apiKey: key });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: "system", content: request.system });
    }
    messages.push({ role: "user", content: request.prompt });

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: request.temperature ?? this.defaults.temperature,
      max_tokens: request.maxTokens ?? this.defaults.maxTokens,
    });

    // Extract the generated text from the first (and only) choice
    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new ProviderError(this.name, "OpenAI returned an empty response");
    }

    return content;
  }
}
