import * as cheerio from "cheerio";

// NewsAPI cuts `content` at 200 chars and appends e.g. "… [+3120 chars]"
const TRUNCATION_MARKER = /\s*\[\+\d+ chars\]\s*$/;

/**
 * Turns a provider snippet into plain text.
 * Strips tags, decodes entities, drops the truncation marker and collapses whitespace.
 */
export function cleanBodyText(raw: string): string {
  const $ = cheerio.load(raw, null, false);
  const text = $.root().text().replace(TRUNCATION_MARKER, "");
  return text.replace(/\s+/g, " ").trim();
}

/**
 * First non-empty candidate wins (content before description).
 * Returns "" when none has text left after cleanup.
 */
export function pickBodyText(...candidates: (string | null | undefined)[]): string {
  for (const candidate of candidates) {
    if (!candidate) continue;
    const cleaned = cleanBodyText(candidate);
    if (cleaned) return cleaned;
  }
  return "";
}
