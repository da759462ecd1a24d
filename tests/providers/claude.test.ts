/**
 * Tests for the Claude provider.
 *
 * Mocks the Anthropic SDK to verify:
 *   - The system prompt goes in the dedicated `system` parameter
 *   - Response text is extracted from content blocks
 *   - Non-text or empty responses throw
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ProviderError } from "../../src/core/errors.js";

const { createMock } = vi.hoisted(() => ({ createMock: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class MockAnthropic {
    messages = {
      create: createMock,
    };
  },
}));

import { ClaudeProvider } from "../../src/providers/claude.js";

describe("ClaudeProvider", () => {
  let provider: ClaudeProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    provider = new ClaudeProvider("claude-3-5-haiku-latest", "test-api-key");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should have the correct provider name", () => {
    expect(provider.name).toBe("claude");
  });

  it("should use the system parameter instead of a system message", async () => {
    createMock.mockResolvedValueOnce({
      content: [{ type: "text", text: "Neutral." }],
    });

    await provider.complete({ system: "You classify text.", prompt: "Classify this." });

    expect(createMock).toHaveBeenCalledWith({
      model: "claude-3-5-haiku-latest",
      max_tokens: 2000,
      temperature: 0.7,
      system: "You classify text.",
      messages: [{ role: "user", content: "Classify this." }],
    });
  });

  it("should leave out system when the request has none", async () => {
    createMock.mockResolvedValueOnce({
      content: [{ type: "text", text: "Hi" }],
    });

    await provider.complete({ prompt: "Hello" });

    expect(createMock.mock.calls[0]?.[0]).not.toHaveProperty("system");
  });

  it("should return trimmed text", async () => {
    createMock.mockResolvedValueOnce({
      content: [{ type: "text", text: "\n  People: Ada Lovelace\n" }],
    });

    await expect(provider.complete({ prompt: "Entities?" })).resolves.toBe("People: Ada Lovelace");
  });

  it("should throw if the response has no text block", async () => {
    createMock.mockResolvedValueOnce({
      content: [{ type: "tool_use", id: "x", name: "y", input: {} }],
    });

    await expect(provider.complete({ prompt: "Anything" })).rejects.toThrow(
      "Claude returned an empty or non-text response",
    );
  });

  it("should throw if the response content is empty", async () => {
    createMock.mockResolvedValueOnce({ content: [] });

    await expect(provider.complete({ prompt: "Anything" })).rejects.toThrow(ProviderError);
  });

  it("should require an API key", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");

    expect(() => new ClaudeProvider("claude-3-5-haiku-latest")).toThrow(
      "Anthropic API key not configured. Set ANTHROPIC_API_KEY.",
    );
  });
});
