/**
 * Ollama provider implementation.
 *
 * Communicates with a locally running Ollama instance via its REST API.
 * Plain fetch calls against the REST API; no SDK and no API key.
 */

import { HttpStatusError, ProviderError } from "../core/errors.js";
import type { CompletionDefaults, CompletionRequest, LLMProvider } from "./base.js";
import { DEFAULT_COMPLETION } from "./base.js";

/** Pull message.content out of an /api/chat response body, if present */
function replyContent(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null || !("message" in body)) return undefined;
  const { message } = body;
  if (typeof message !== "object" || message === null || !("content" in message)) return undefined;
  return typeof message.content === "string" ? message.content : undefined;
}

export class OllamaProvider implements LLMProvider {
  readonly name = "ollama";
  readonly model: string;
  private baseUrl: string;
  private defaults: CompletionDefaults;

  /**
   * @param model - The Ollama model name (e.g., "llama3.1", "mistral").
   * @param baseUrl - Ollama server URL. Falls back to OLLAMA_URL, then localhost:11434.
   */
  constructor(model: string, baseUrl?: string, defaults: CompletionDefaults = DEFAULT_COMPLETION) {
    this.model = model;
    this.defaults = defaults;
    this.baseUrl = (baseUrl ?? process.env.OLLAMA_URL ?? "http://localhost:11434").replace(/\/+$/, "");
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages = [
      ...(request.system ? [{ role: "system", content: request.system }] : []),
      { role: "user", content: request.prompt },
    ];

    const url = `${this.baseUrl}/api/chat`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        // stream: false makes Ollama return the full response in one JSON object
        stream: false,
        messages,
        options: {
          temperature: request.temperature ?? this.defaults.temperature,
          num_predict: request.maxTokens ?? this.defaults.maxTokens,
        },
      }),
    });

    if (!response.ok) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }

    const body: unknown = await response.json();
    const content = replyContent(body)?.trim();
    if (!content) {
      throw new ProviderError(this.name, "Ollama returned an empty response");
    }

    return content;
  }
}
