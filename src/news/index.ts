/**
 * Article source: NewsAPI search + snippet cleanup
 */
export { DEFAULT_KEYWORDS, KEYWORD_TERMS, toKeywordQuery } from "./keywords";
export { NewsApiClient, buildSearchUrl, toRawArticle } from "./client";
export type { ArticleSource, NewsApiArticle, RawArticle } from "./client";
export { cleanBodyText, pickBodyText } from "./text";
