/**
 * Error types shared across the harvester.
 *
 * Each class carries the context callers need to report a failure without
 * re-parsing the message (status codes, config paths, provider names).
 */

/** A response arrived but its status was outside 200-299 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;

  constructor(url: string, status: number, statusText: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`);
    this.name = "HttpStatusError";
    this.url = url;
    this.status = status;
    this.statusText = statusText;
  }
}

/** The URL is empty, unparseable, or not http(s) */
export class InvalidUrlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidUrlError";
  }
}

/** Configuration failed validation; `issues` lists each offending path */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** An LLM provider could not be created or returned an unusable response */
export class ProviderError extends Error {
  readonly provider: string;

  constructor(provider: string, message: string) {
    super(message);
    this.name = "ProviderError";
    this.provider = provider;
  }
}

/**
 * Extract a human-readable message from an unknown thrown value.
 * Timeouts from AbortSignal.timeout() surface as a DOMException named
 * "TimeoutError"; undici wraps socket failures in `cause`.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === "TimeoutError") return "Request timed out";
    if (err.cause instanceof Error && err.message === "fetch failed") {
      return `fetch failed: ${err.cause.message}`;
    }
    return err.message;
  }
  return String(err);
}

/** HTTP status carried by an error, if any */
export function getErrorStatus(err: unknown): number | null {
  return err instanceof HttpStatusError ? err.status : null;
}

/**
 * Decide whether a failed fetch is worth repeating.
 * Network errors, timeouts, 408, 429 and 5xx are transient; other 4xx
 * responses and malformed URLs will fail the same way again.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof InvalidUrlError) return false;
  if (err instanceof HttpStatusError) {
    return err.status === 408 || err.status === 429 || err.status >= 500;
  }
  return true;
}
