/**
 * Tests for the provider factory.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import type { ProviderConfig } from "../../src/config/types.js";
import { ProviderError } from "../../src/core/errors.js";
import {
  ClaudeProvider,
  OllamaProvider,
  OpenAIProvider,
  createProvider,
} from "../../src/providers/index.js";

const base: ProviderConfig = {
  name: "openai",
  model: "gpt-4o-mini",
  temperature: 0.7,
  maxTokens: 2000,
};

describe("createProvider", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should create each configured provider", () => {
    expect(createProvider({ ...base, apiKey: "test-secret" })).toBeInstanceOf(OpenAIProvider);
    expect(
      createProvider({ ...base, name: "claude", model: "claude-3-5-haiku-latest", apiKey: "test-secret" }),
    ).toBeInstanceOf(ClaudeProvider);
    expect(createProvider({ ...base, name: "ollama", model: "llama3.1" })).toBeInstanceOf(OllamaProvider);
  });

  it("should pass the model through", () => {
    const provider = createProvider({ ...base, name: "ollama", model: "mistral" });
    expect(provider.model).toBe("mistral");
  });

  it("should throw ProviderError when credentials are missing", () => {
    vi.stubEnv("OPENAI_API_KEY", "");
    expect(() => createProvider(base)).toThrow(ProviderError);
  });
});
