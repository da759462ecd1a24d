/**
 * LLM-backed content analysis.
 *
 * Each operation is a prompt template plus one provider.complete() call.
 * Replies are passed through as text: there is no output schema, so a
 * sentiment or entity answer is whatever the model wrote. Failures are
 * logged and turned into a fallback value instead of thrown, so one bad
 * completion never sinks a whole harvest.
 */

import type { LLMProvider } from "../providers/base.js";
import { getErrorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { countWords } from "./utils.js";

export const ANALYSIS_TYPES = ["full", "summary", "sentiment", "entities"] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

/** The fields of a scraped page the analyzer reads */
export interface AnalyzablePage {
  url: string;
  title: string;
  text: string;
}

export interface AnalysisReport {
  url: string;
  title: string;
  summary?: string;
  sentiment?: string | null;
  entities?: string | null;
  keywords?: string[];
  classification?: string | null;
}

export interface AnalyzeOptions {
  /** Summary length in words */
  maxWords?: number;
  keywordCount?: number;
  /** When set, a "full" analysis also classifies the text */
  categories?: string[];
}

/** Summary fallback keeps roughly this many characters per requested word */
const TRUNCATION_MULTIPLIER = 5;

export function isAnalysisType(value: string): value is AnalysisType {
  return ANALYSIS_TYPES.some((type) => type === value);
}

export class ContentAnalyzer {
  private provider: LLMProvider;
  private logger: Logger;

  constructor(provider: LLMProvider, logger: Logger = silentLogger) {
    this.provider = provider;
    this.logger = logger;
  }

  /**
   * Summarize text in about `maxWords` words.
   * Text already within the limit is returned unchanged without a model
   * call; if the call fails the text is truncated instead.
   */
  async summarize(text: string, maxWords = 200): Promise<string> {
    if (countWords(text) <= maxWords) {
      return text;
    }

    try {
      const summary = await this.provider.complete({
        system: "You are a helpful assistant that creates concise and accurate summaries.",
        prompt: `Please summarize the following text in approximately ${maxWords} words:\n\n${text}`,
      });
      this.logger.info("Text summarized", { words: countWords(summary) });
      return summary;
    } catch (err) {
      this.logger.error("Error summarizing text", { error: getErrorMessage(err) });
      return text.slice(0, maxWords * TRUNCATION_MULTIPLIER);
    }
  }

  /** Named entities as the model listed them, or null on failure */
  async extractEntities(text: string): Promise<string | null> {
    const prompt = [
      "Extract and categorize the following entities from the text:",
      "- People (names of persons)",
      "- Organizations (companies, institutions)",
      "- Locations (cities, countries)",
      "- Dates (any date references)",
      "- Products (product names)",
      "",
      `Text: ${text}`,
      "",
      "Return the results as a JSON-like structure with entity types as keys and lists of entities as values.",
    ].join("\n");

    return this.ask("entities", {
      system: "You are an expert in named entity recognition. Extract entities accurately.",
      prompt,
    });
  }

  /**
   * Ask the model to pick one of `categories` with a confidence score.
   *
   * @throws Error when `categories` is empty.
   */
  async classify(text: string, categories: string[]): Promise<string | null> {
    if (categories.length === 0) {
      throw new Error("At least one category is required");
    }

    return this.ask("classification", {
      system: "You are an expert content classifier. Provide accurate classifications.",
      prompt: [
        `Classify the following text into one of these categories: ${categories.join(", ")}`,
        "",
        `Text: ${text}`,
        "",
        "Provide the most appropriate category and a confidence score (0-1).",
      ].join("\n"),
    });
  }

  async analyzeSentiment(text: string): Promise<string | null> {
    return this.ask("sentiment", {
      system: "You are an expert in sentiment analysis. Provide detailed and accurate analysis.",
      prompt: [
        "Analyze the sentiment of the following text.",
        "Provide:",
        "1. Overall sentiment (positive/negative/neutral)",
        "2. Confidence score (0-1)",
        "3. Key phrases that indicate the sentiment",
        "",
        `Text: ${text}`,
      ].join("\n"),
    });
  }

  /** Up to `count` keywords from a comma-separated reply; [] on failure */
  async extractKeywords(text: string, count = 10): Promise<string[]> {
    const reply = await this.ask("keywords", {
      system: "You are an expert in keyword extraction. Identify the most relevant terms.",
      prompt: [
        `Extract the ${count} most important keywords or key phrases from the following text.`,
        "Return them as a comma-separated list.",
        "",
        `Text: ${text}`,
      ].join("\n"),
    });
    if (reply === null) return [];

    return reply
      .split(",")
      .map((keyword) => keyword.trim())
      .filter(Boolean)
      .slice(0, count);
  }

  /**
   * Run one analysis type over a scraped page.
   *
   * @returns null (with a warning) when the page has no text.
   * @throws Error for an unknown analysis type.
   */
  async analyze(
    page: AnalyzablePage,
    type: string = "full",
    options: AnalyzeOptions = {},
  ): Promise<AnalysisReport | null> {
    if (!isAnalysisType(type)) {
      throw new Error(`Invalid analysis type "${type}". Must be one of: ${ANALYSIS_TYPES.join(", ")}`);
    }
    if (!page.text) {
      this.logger.warn("No text content to analyze", { url: page.url });
      return null;
    }

    const { text } = page;
    const report: AnalysisReport = { url: page.url, title: page.title };

    if (type === "full" || type === "summary") {
      report.summary = await this.summarize(text, options.maxWords);
    }
    if (type === "full" || type === "sentiment") {
      report.sentiment = await this.analyzeSentiment(text);
    }
    if (type === "full" || type === "entities") {
      report.entities = await this.extractEntities(text);
    }
    if (type === "full") {
      report.keywords = await this.extractKeywords(text, options.keywordCount);
      if (options.categories && options.categories.length > 0) {
        report.classification = await this.classify(text, options.categories);
      }
    }

    this.logger.info("Analysis completed", { url: page.url, type });
    return report;
  }

  /** One completion; logs and returns null instead of throwing */
  private async ask(
    task: string,
    request: { system: string; prompt: string },
  ): Promise<string | null> {
    try {
      const reply = await this.provider.complete(request);
      this.logger.debug("Completion received", { task, provider: this.provider.name });
      return reply;
    } catch (err) {
      this.logger.error(`Error during ${task} analysis`, { error: getErrorMessage(err) });
      return null;
    }
  }
}
