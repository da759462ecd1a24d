/**
 * Web page scraper.
 *
 * Fetches a URL, parses the HTML once, and runs the extractors over it to
 * produce a ScrapedPage. The pipeline: fetch HTML → parse DOM → extract
 * fields → (optionally) Readability article.
 *
 * Failures never escape scrape(): they are logged and returned as a
 * ScrapeFailure so a batch keeps going past a bad URL.
 */

import type { ScrapingConfig } from "../config/types.js";
import { getErrorMessage, getErrorStatus } from "./errors.js";
import {
  extractArticle,
  extractFields,
  extractImages,
  extractLinks,
  extractMeta,
  extractText,
  extractTitle,
  parseHtml,
  type ImageInfo,
  type PageMeta,
  type ReadableArticle,
} from "./extractor.js";
import { PageFetcher, type FetchedPage } from "./fetcher.js";
import { silentLogger, type Logger } from "./logger.js";
import { sleep } from "./utils.js";

/** Everything extracted from one successfully fetched page */
export interface ScrapedPage {
  /** URL as requested */
  url: string;
  /** URL after redirects */
  finalUrl: string;
  statusCode: number;
  title: string;
  text: string;
  meta: PageMeta;
  links: string[];
  images: ImageInfo[];
  /** Matches of the custom selectors, keyed by selector name */
  fields: Record<string, string[]>;
  /** Present only when the article option was set */
  article?: ReadableArticle | null;
  scrapedAt: string;
}

/** Record for a URL that failed to fetch or parse */
export interface ScrapeFailure {
  url: string;
  statusCode: number | null;
  error: string;
  scrapedAt: string;
}

/** Result of scraping a single page: discriminated union */
export type ScrapeResult =
  | { success: true; data: ScrapedPage }
  | { success: false; error: ScrapeFailure };

export interface ScrapeOptions {
  /** Named CSS selectors, e.g. { headings: "h1, h2, h3" } */
  selectors?: Record<string, string>;
  /** Also extract the readable article as markdown */
  article?: boolean;
}

export interface ScrapeMultipleOptions extends ScrapeOptions {
  /** Pause between requests; defaults to the configured delay */
  delayMs?: number;
  /** Progress hook, called after each URL */
  onResult?: (result: ScrapeResult, index: number, total: number) => void;
}

/** The part of PageFetcher the scraper depends on */
export interface Fetcher {
  fetchPage(url: string): Promise<FetchedPage>;
}

export interface WebScraperOptions {
  logger?: Logger;
  /** Replaces the default PageFetcher built from the config */
  fetcher?: Fetcher;
}

export class WebScraper {
  private fetcher: Fetcher;
  private logger: Logger;
  private delayMs: number;

  constructor(config: ScrapingConfig, options: WebScraperOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.delayMs = config.delayMs;
    this.fetcher =
      options.fetcher ??
      new PageFetcher({
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
        userAgent: config.userAgent,
        logger: this.logger.child("fetch"),
      });
  }

  /**
   * Build a ScrapedPage from HTML that has already been fetched.
   * Links and images are resolved against the post-redirect URL.
   */
  extract(page: FetchedPage, options: ScrapeOptions = {}): ScrapedPage {
    const doc = parseHtml(page.html);
    const base = page.finalUrl || page.url;

    const data: ScrapedPage = {
      url: page.url,
      finalUrl: page.finalUrl,
      statusCode: page.status,
      title: extractTitle(doc),
      text: extractText(doc),
      meta: extractMeta(doc),
      links: extractLinks(doc, base),
      images: extractImages(doc, base),
      fields: options.selectors ? extractFields(doc, options.selectors) : {},
      scrapedAt: new Date().toISOString(),
    };

    if (options.article) {
      data.article = extractArticle(page.html, base);
    }
    return data;
  }

  /**
   * Scrape a URL and extract structured data.
   *
   * @throws Error only when the URL is empty; every other failure is
   *         returned as `{ success: false }`.
   */
  async scrape(url: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
    if (!url || !url.trim()) {
      throw new Error("URL cannot be empty");
    }

    try {
      const page = await this.fetcher.fetchPage(url);
      const data = this.extract({ ...page, url }, options);
      this.logger.info("Scraped page", {
        url,
        links: data.links.length,
        images: data.images.length,
      });
      return { success: true, data };
    } catch (err) {
      const error = getErrorMessage(err);
      this.logger.error("Failed to scrape page", { url, error });
      return {
        success: false,
        error: {
          url,
          statusCode: getErrorStatus(err),
          error,
          scrapedAt: new Date().toISOString(),
        },
      };
    }
  }

  /**
   * Scrape URLs one after another with a fixed pause between requests.
   * Results come back in input order, one per URL.
   */
  async scrapeMultiple(
    urls: string[],
    options: ScrapeMultipleOptions = {},
  ): Promise<ScrapeResult[]> {
    const { delayMs = this.delayMs, onResult, ...scrapeOptions } = options;
    const results: ScrapeResult[] = [];

    for (const [index, url] of urls.entries()) {
      if (index > 0 && delayMs > 0) {
        await sleep(delayMs);
      }
      const result = await this.scrape(url, scrapeOptions);
      results.push(result);
      onResult?.(result, index, urls.length);
    }

    return results;
  }
}
