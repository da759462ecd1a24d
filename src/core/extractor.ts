/**
 * HTML field extraction.
 *
 * Pure functions over a parsed DOM: nothing here touches the network, so the
 * scraper can fetch once and run every extractor against the same document.
 */

import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import TurndownService from "turndown";
import { cleanText } from "./utils.js";

/** An <img> found on the page */
export interface ImageInfo {
  /** Absolute URL of the image */
  url: string;
  alt: string;
  title: string;
}

/** Common <head> metadata; empty strings when a tag is absent */
export interface PageMeta {
  description: string;
  keywords: string;
  canonical: string;
  ogImage: string;
  lang: string;
}

/** The page's main readable content, as produced by Readability */
export interface ReadableArticle {
  title: string;
  byline: string | null;
  /** Main content converted to markdown (possibly truncated) */
  content: string;
  /** First ~200 characters of the plain text */
  excerpt: string;
  /** Length of the plain text before truncation */
  length: number;
}

/** Maximum markdown length kept for the readable article */
export const MAX_ARTICLE_LENGTH = 15_000;

const EXCERPT_LENGTH = 200;

/** Elements whose text is never page content */
const NON_CONTENT_TAGS = new Set(["SCRIPT", "STYLE", "NOSCRIPT", "TEMPLATE"]);

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

// Reusable Turndown instance for HTML→markdown conversion.
const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
});

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Concatenated text of a subtree, skipping scripts, styles and templates */
function visibleText(node: Node): string {
  if (node.nodeType === TEXT_NODE) return node.textContent ?? "";
  if (isElement(node) && NON_CONTENT_TAGS.has(node.tagName.toUpperCase())) return "";

  let text = "";
  for (const child of Array.from(node.childNodes)) {
    text += visibleText(child);
  }
  return text;
}

/** Resolve `href` against `baseUrl`, or null when it can't be parsed */
function toAbsoluteUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/** Parse an HTML string into a DOM document */
export function parseHtml(html: string): Document {
  return parseHTML(html).document;
}

/** Text of the <title> element, whitespace-normalized; "" when missing */
export function extractTitle(doc: Document): string {
  return cleanText(doc.querySelector("title")?.textContent);
}

/**
 * Extract text content from the document.
 *
 * @param selector - When given, only the text of matching elements is
 *                   returned, joined with a space.
 */
export function extractText(doc: Document, selector?: string): string {
  if (selector) {
    return cleanText(
      Array.from(doc.querySelectorAll(selector))
        .map((el) => visibleText(el))
        .join(" "),
    );
  }
  const root: Node | null = doc.body ?? doc.documentElement;
  return root ? cleanText(visibleText(root)) : "";
}

/**
 * Every <a href> on the page as an absolute URL, in document order.
 * Duplicates are kept; hrefs that can't be resolved are skipped.
 */
export function extractLinks(doc: Document, baseUrl: string): string[] {
  const links: string[] = [];
  for (const anchor of Array.from(doc.querySelectorAll("a[href]"))) {
    const href = anchor.getAttribute("href")?.trim();
    if (!href) continue;
    const absolute = toAbsoluteUrl(href, baseUrl);
    if (absolute) links.push(absolute);
  }
  return links;
}

/** Every <img src> with its alt and title text */
export function extractImages(doc: Document, baseUrl: string): ImageInfo[] {
  const images: ImageInfo[] = [];
  for (const img of Array.from(doc.querySelectorAll("img[src]"))) {
    const src = img.getAttribute("src")?.trim();
    if (!src) continue;
    const url = toAbsoluteUrl(src, baseUrl);
    if (!url) continue;
    images.push({
      url,
      alt: img.getAttribute("alt") ?? "",
      title: img.getAttribute("title") ?? "",
    });
  }
  return images;
}

/**
 * Run named CSS selectors and collect the cleaned text of each match.
 *
 * @param selectors - e.g. { headings: "h1, h2", prices: ".price" }
 * @returns e.g. { headings: ["Intro", "Details"], prices: [] }
 */
export function extractFields(
  doc: Document,
  selectors: Record<string, string>,
): Record<string, string[]> {
  const fields: Record<string, string[]> = {};
  for (const [name, selector] of Object.entries(selectors)) {
    fields[name] = Array.from(doc.querySelectorAll(selector)).map((el) =>
      cleanText(visibleText(el)),
    );
  }
  return fields;
}

function attr(doc: Document, selector: string, name: string): string {
  return doc.querySelector(selector)?.getAttribute(name)?.trim() ?? "";
}

export function extractMeta(doc: Document): PageMeta {
  return {
    description: attr(doc, 'meta[name="description"]', "content"),
    keywords: attr(doc, 'meta[name="keywords"]', "content"),
    canonical: attr(doc, 'link[rel="canonical"]', "href"),
    ogImage: attr(doc, 'meta[property="og:image"]', "content"),
    lang: doc.documentElement?.getAttribute("lang")?.trim() ?? "",
  };
}

/**
 * Extract the main readable content of a page as markdown.
 *
 * Readability mutates the DOM it is given, so this parses its own copy of
 * the HTML instead of taking the shared document.
 *
 * @returns null when Readability finds no article content.
 */
export function extractArticle(html: string, url: string): ReadableArticle | null {
  const doc = parseHtml(html);
  const article = new Readability(doc, { keepClasses: false }).parse();
  if (!article || !article.content) {
    return null;
  }

  let markdown = turndown.turndown(article.content);
  if (markdown.length > MAX_ARTICLE_LENGTH) {
    markdown = markdown.slice(0, MAX_ARTICLE_LENGTH) + "\n\n[Content truncated]";
  }

  const plainText = cleanText(article.textContent);
  return {
    title: cleanText(article.title) || url,
    byline: article.byline ? cleanText(article.byline) : null,
    content: markdown,
    excerpt: plainText.slice(0, EXCERPT_LENGTH),
    length: plainText.length,
  };
}
