import type { ArticleCategory } from "../ai";

// key order here is the key order in news.json
export type EnrichedArticle = Readonly<{
  title: string;
  summary: string;
  url: string;
  category: ArticleCategory;
  date: string | null;
}>;

export interface OutputDocument {
  last_updated: string;
  articles: EnrichedArticle[];
}

/**
 * Keeps the first article seen for each url, in original order
 */
export function dedupeByUrl(articles: readonly EnrichedArticle[]): EnrichedArticle[] {
  const seen = new Set<string>();
  const unique: EnrichedArticle[] = [];

  for (const article of articles) {
    if (seen.has(article.url)) continue;
    seen.add(article.url);
    unique.push(article);
  }
  return unique;
}

export function buildDocument(articles: EnrichedArticle[], timestamp: string): OutputDocument {
  return { last_updated: timestamp, articles };
}

export function serializeDocument(doc: OutputDocument): string {
  return JSON.stringify(doc, null, 4);
}
