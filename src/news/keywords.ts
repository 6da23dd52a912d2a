/**
 * Search terms for SSB-relevant news.
 * To track a new topic, add it to this array; multi-word terms are quoted automatically.
 */
export const KEYWORD_TERMS: string[] = [
  "DRDO",
  "Indian Navy",
  "Indian Army",
  "Indian Air Force",
  "ISRO",
  "HAL",
  "Defence Ministry",
  "BrahMos",
  "Agni-V",
  "Malabar",
  "LAC",
  "LOC",
  "Submarine",
  "Tejas",
  "Chandrayaan",
  "Make in India",
];

export function toKeywordQuery(terms: string[]): string {
  return terms
    .map((term) => term.trim())
    .filter((term) => term.length > 0)
    .map((term) => (/\s/.test(term) ? `"${term}"` : term))
    .join(" OR ");
}

export const DEFAULT_KEYWORDS = toKeywordQuery(KEYWORD_TERMS);
