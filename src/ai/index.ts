export { GeminiClient, buildGenerateUrl } from "./client";
export { CATEGORIES, buildPrompt, isArticleCategory } from "./prompts";
export type { ArticleCategory } from "./prompts";
export { decodeAiResult, stripCodeFences } from "./decode";
export type { AiResult, DecodeResult } from "./decode";
export { ArticleSummarizer, summarizeOnce } from "./summarizer";
export type { Summarizer, SummarizerOptions, TextGenerator } from "./summarizer";
