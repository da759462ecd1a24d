/**
 * Base types and interface for the LLM provider plugin system.
 *
 * All providers (OpenAI, Claude, Ollama) implement the LLMProvider interface.
 * The analyzer builds a prompt and calls provider.complete() without
 * caring which model answers.
 */

/** A single prompt/response exchange with the model */
export interface CompletionRequest {
  /** Instructions placed in the system slot (or system parameter) */
  system?: string;
  /** The user message */
  prompt: string;
  temperature?: number;
  maxTokens?: number;
}

/** Sampling defaults applied when a request leaves them out */
export interface CompletionDefaults {
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_COMPLETION: CompletionDefaults = {
  temperature: 0.7,
  maxTokens: 2_000,
};

/**
 * The contract every LLM provider must fulfill.
 * Implementing this interface is all that's needed to add a new backend.
 */
export interface LLMProvider {
  /** Human-readable provider name (e.g., "openai", "claude") */
  readonly name: string;
  readonly model: string;

  /**
   * Send one prompt and return the model's reply.
   *
   * @returns The reply text, trimmed.
   * @throws ProviderError when the reply is empty.
   */
  complete(request: CompletionRequest): Promise<string>;
}
