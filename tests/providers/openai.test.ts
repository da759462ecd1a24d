/**
 * Tests for the OpenAI provider.
 *
 * Mocks the OpenAI SDK to verify:
 *   - Request shape (model, system message, sampling defaults)
 *   - Response text is returned and trimmed
 *   - Empty responses and missing keys throw ProviderError
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ProviderError } from "../../src/core/errors.js";

// vi.mock is hoisted above imports, so the mock fn must be hoisted too
const { createMock } = vi.hoisted(() => ({ createMock: vi.fn() }));

vi.mock("openai", () => ({
  default: class MockOpenAI {
    chat = {
      completions: {
        create: createMock,
      },
    };
  },
}));

import { OpenAIProvider } from "../../src/providers/openai.js";

describe("OpenAIProvider", () => {
  let provider: OpenAIProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    provider = new OpenAIProvider("gpt-4o", "test-api-key", { temperature: 0.2, maxTokens: 500 });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should have the correct provider name and model", () => {
    expect(provider.name).toBe("openai");
    expect(provider.model).toBe("gpt-4o");
  });

  it("should send the system and user messages with the configured sampling", async () => {
    createMock.mockResolvedValueOnce({
      choices: [{ message: { content: "A short summary." } }],
    });

    await provider.complete({ system: "Be brief.", prompt: "Summarize this page." });

    expect(createMock).toHaveBeenCalledOnce();
    expect(createMock).toHaveBeenCalledWith({
      model: "gpt-4o",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Summarize this page." },
      ],
      temperature: 0.2,
      max_tokens: 500,
    });
  });

  it("should omit the system message and honour per-request sampling", async () => {
    createMock.mockResolvedValueOnce({
      choices: [{ message: { content: "ok" } }],
    });

    await provider.complete({ prompt: "Hello", temperature: 0, maxTokens: 10 });

    expect(createMock).toHaveBeenCalledWith({
      model: "gpt-4o",
      messages: [{ role: "user", content: "Hello" }],
      temperature: 0,
      max_tokens: 10,
    });
  });

  it("should return trimmed text", async () => {
    createMock.mockResolvedValueOnce({
      choices: [{ message: { content: "  positive, 0.9  " } }],
    });

    await expect(provider.complete({ prompt: "Sentiment?" })).resolves.toBe("positive, 0.9");
  });

  it("should throw if the API returns an empty response", async () => {
    createMock.mockResolvedValueOnce({
      choices: [{ message: { content: null } }],
    });

    await expect(provider.complete({ prompt: "Anything" })).rejects.toThrow(
      "OpenAI returned an empty response",
    );
  });

  it("should require an API key", () => {
    vi.stubEnv("OPENAI_API_KEY", "");

    expect(() => new OpenAIProvider("gpt-4o")).toThrow(ProviderError);
  });

  it("should fall back to OPENAI_API_KEY", () => {
    vi.stubEnv("OPENAI_API_KEY", "test-secret");

    expect(new OpenAIProvider("gpt-4o").model).toBe("gpt-4o");
  });
});
