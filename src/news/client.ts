import * as v from "valibot";
import type { NewsApiConfig } from "../config";
import { SourceError, describeError, isAbortError } from "../errors";
import { pickBodyText } from "./text";

export interface RawArticle {
  title: string;
  url: string; // unique key
  publishedAt: string | null;
  bodyText: string; // content, falling back to description
}

export interface ArticleSource {
  search(keywords: string, pageSize: number): Promise<RawArticle[]>;
}

const NewsApiArticleSchema = v.object({
  title: v.nullish(v.string()),
  url: v.nullish(v.string()),
  publishedAt: v.nullish(v.string()),
  content: v.nullish(v.string()),
  description: v.nullish(v.string()),
});

export type NewsApiArticle = v.InferOutput<typeof NewsApiArticleSchema>;

const NewsApiResponseSchema = v.object({
  status: v.string(),
  code: v.optional(v.string()),
  message: v.optional(v.string()),
  // items are checked one by one so a single odd entry is dropped, not fatal
  articles: v.optional(v.array(v.unknown())),
});

/**
 * Search query: English results, newest first, at most `pageSize` of them.
 */
export function buildSearchUrl(
  config: Pick<NewsApiConfig, "endpoint" | "apiKey">,
  keywords: string,
  pageSize: number
): string {
  const url = new URL(config.endpoint);
  url.searchParams.set("q", keywords);
  url.searchParams.set("language", "en");
  url.searchParams.set("sortBy", "publishedAt");
  url.searchParams.set("pageSize", String(pageSize));
  url.searchParams.set("apiKey", config.apiKey);
  return url.toString();
}

/**
 * Articles without title, url or any body text are not usable downstream
 */
export function toRawArticle(item: NewsApiArticle): RawArticle | null {
  const title = item.title?.trim();
  const url = item.url?.trim();
  if (!title || !url) return null;

  const bodyText = pickBodyText(item.content, item.description);
  if (!bodyText) return null;

  return {
    title,
    url,
    publishedAt: item.publishedAt ?? null,
    bodyText,
  };
}

export class NewsApiClient implements ArticleSource {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: NewsApiConfig,
    fetchImpl: typeof fetch = fetch
  ) {
    this.fetchImpl = fetchImpl;
  }

  async search(keywords: string, pageSize: number): Promise<RawArticle[]> {
    const { status, body } = await this.request(buildSearchUrl(this.config, keywords, pageSize));

    const parsed = v.safeParse(NewsApiResponseSchema, body);
    if (!parsed.success) {
      throw new SourceError(`Unexpected NewsAPI response: ${parsed.issues[0].message}`, { status });
    }

    const data = parsed.output;
    if (data.status !== "ok") {
      throw new SourceError(`NewsAPI error: ${data.message ?? data.status}`, {
        status,
        code: data.code,
      });
    }

    const items = data.articles ?? [];
    const articles: RawArticle[] = [];
    for (const item of items) {
      const parsedItem = v.safeParse(NewsApiArticleSchema, item);
      const article = parsedItem.success ? toRawArticle(parsedItem.output) : null;
      if (article) articles.push(article);
    }

    const dropped = items.length - articles.length;
    console.log(
      `[news] ${items.length} results, ${articles.length} usable` +
        (dropped > 0 ? ` (${dropped} malformed or missing title/url/body)` : "")
    );
    return articles;
  }

  /**
   * The timeout covers the whole exchange, body included.
   */
  private async request(url: string): Promise<{ status: number; body: unknown }> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new SourceError(`NewsAPI request timed out after ${this.config.timeoutMs}ms`));
      }, this.config.timeoutMs);
    });

    try {
      return await Promise.race([this.fetchJson(url, controller.signal), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchJson(url: string, signal: AbortSignal): Promise<{ status: number; body: unknown }> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        signal,
        headers: {
          "User-Agent": "ssb-news-digest/0.1",
          Accept: "application/json",
        },
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new SourceError(`NewsAPI request timed out after ${this.config.timeoutMs}ms`, { cause: err });
      }
      throw new SourceError(`NewsAPI request failed: ${describeError(err)}`, { cause: err });
    }

    // error responses (401, 426, 429...) still carry {status: "error", message}
    try {
      return { status: res.status, body: await res.json() };
    } catch (err) {
      if (isAbortError(err)) {
        throw new SourceError(`NewsAPI request timed out after ${this.config.timeoutMs}ms`, { cause: err });
      }
      throw new SourceError(`NewsAPI returned a non-JSON body (HTTP ${res.status})`, {
        status: res.status,
        cause: err,
      });
    }
  }
}
