/**
 * Gemini prompt template
 * Summary and category come back from a single call
 */

export const CATEGORIES = ["Defence", "National", "International", "Sci & Tech"] as const;

export type ArticleCategory = (typeof CATEGORIES)[number];

export function isArticleCategory(value: string): value is ArticleCategory {
  return CATEGORIES.some((category) => category === value);
}

const MAX_BODY_CHARS = 3000;

export function buildPrompt(bodyText: string): string {
  // long bodies are cut to save tokens
  const trimmed =
    bodyText.length > MAX_BODY_CHARS ? bodyText.slice(0, MAX_BODY_CHARS) + "..." : bodyText;

  const categories = CATEGORIES.map((c) => `"${c}"`).join(", ");

  return `You are an expert news summarizer for an SSB (Service Selection Board) academy website.
Summarize this news for an SSB aspirant in about 60 words, providing slightly more detail.
Also assign exactly one category from: ${categories}.

Analyze the text and return *only* a single valid JSON object in the following format:
{"summary": "Your concise summary here.", "category": "One of the categories"}

ARTICLE TEXT:
"${trimmed}"`;
}
