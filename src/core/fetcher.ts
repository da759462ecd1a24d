/**
 * HTTP page fetcher.
 *
 * A thin policy layer over the global fetch: URL validation, browser-like
 * headers, a per-request timeout, and exponential-backoff retries for
 * transient failures. One fetcher instance is shared across a run.
 */

import { HttpStatusError, InvalidUrlError, getErrorMessage, isRetryable } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { withRetry, type RetryOptions } from "./retry.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36";

export interface FetcherOptions {
  timeoutMs?: number;
  /** Retries after the first attempt */
  maxRetries?: number;
  userAgent?: string;
  logger?: Logger;
  /** Backoff tuning; attempt count always comes from maxRetries */
  backoff?: Partial<Omit<RetryOptions, "maxAttempts">>;
}

/** What a successful fetch hands to the extractor */
export interface FetchedPage {
  /** The URL that was requested */
  url: string;
  /** The URL after redirects */
  finalUrl: string;
  status: number;
  contentType: string;
  html: string;
}

/**
 * Parse and check a URL string.
 *
 * @throws InvalidUrlError if the URL is empty, unparseable, or not http(s).
 */
export function validateUrl(url: string): URL {
  if (!url || !url.trim()) {
    throw new InvalidUrlError("URL cannot be empty");
  }
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    throw new InvalidUrlError(`Invalid URL format: ${url}`);
  }
  if ((parsed.protocol !== "http:" && parsed.protocol !== "https:") || !parsed.hostname) {
    throw new InvalidUrlError(`Invalid URL format: ${url}`);
  }
  return parsed;
}

export class PageFetcher {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  private userAgent: string;
  private logger: Logger;
  private backoff: Partial<RetryOptions>;

  constructor(options: FetcherOptions = {}) {
    const { timeoutMs = 30_000, maxRetries = 2 } = options;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError("Timeout must be positive");
    }
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError("Max retries cannot be negative");
    }

    this.timeoutMs = timeoutMs;
    this.maxRetries = maxRetries;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? silentLogger;
    this.backoff = options.backoff ?? {};
  }

  /**
   * Fetch the HTML of a page, retrying transient failures.
   *
   * @throws InvalidUrlError for a malformed URL (never retried).
   * @throws HttpStatusError for a non-2xx response once retries are spent.
   */
  async fetchPage(url: string): Promise<FetchedPage> {
    const target = validateUrl(url).href;

    return withRetry(
      async (attempt) => {
        this.logger.info("Fetching page", { url: target, attempt });
        const response = await fetch(target, {
          redirect: "follow",
          signal: AbortSignal.timeout(this.timeoutMs),
          headers: {
            "User-Agent": this.userAgent,
            Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
            "Accept-Language": "en-US,en;q=0.9",
          },
        });

        if (!response.ok) {
          throw new HttpStatusError(target, response.status, response.statusText);
        }

        return {
          url: target,
          finalUrl: response.url || target,
          status: response.status,
          contentType: response.headers.get("content-type") ?? "",
          html: await response.text(),
        };
      },
      {
        ...this.backoff,
        maxAttempts: this.maxRetries + 1,
        shouldRetry: isRetryable,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("Fetch attempt failed, retrying", {
            url: target,
            attempt,
            nextDelayMs: delayMs,
            error: getErrorMessage(error),
          });
        },
      },
    );
  }
}
