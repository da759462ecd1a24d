/**
 * Small helpers shared by the scraper, analyzer and exporter.
 */

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Collapse every run of whitespace (including newlines and non-breaking
 * spaces) into a single space and trim the ends.
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) return "";
  return text.replace(/\s+/g, " ").trim();
}

/** Count whitespace-separated words */
export function countWords(text: string): number {
  const cleaned = cleanText(text);
  return cleaned ? cleaned.split(" ").length : 0;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as "YYYYMMDD_HHMMSS", for output filenames */
export function getTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
