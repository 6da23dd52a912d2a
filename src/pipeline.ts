import { isArticleCategory } from "./ai";
import type { Summarizer } from "./ai";
import { describeError } from "./errors";
import type { ArticleSource, RawArticle } from "./news";
import { finalize } from "./output";
import type { EnrichedArticle, OutputDocument } from "./output";

export type PipelineState =
  | "idle"
  | "fetching"
  | "enriching"
  | "deduplicating"
  | "writing"
  | "done"
  | "failed";

export type ArticleState = "fetched" | "summarizing" | "enriched" | "skipped";

export interface ArticleOutcome {
  url: string;
  title: string;
  state: ArticleState;
  error?: string;
}

export interface RunReport {
  startedAt: string;
  fetched: number;
  enriched: number;
  skipped: number;
  written: number;
  outcomes: ArticleOutcome[];
}

export interface PipelineOptions {
  keywords: string;
  pageSize: number;
  outputFile: string;
  source: ArticleSource;
  summarizer: Summarizer;
  now?: () => Date;
}

/**
 * One run: fetch → summarize each article → dedupe → write.
 * Only a source or write failure fails the run; article failures are skipped.
 */
export class NewsPipeline {
  private _state: PipelineState = "idle";
  private _lastReport: RunReport | null = null;

  constructor(private readonly options: PipelineOptions) {}

  get state(): PipelineState {
    return this._state;
  }

  get lastReport(): RunReport | null {
    return this._lastReport;
  }

  async run(): Promise<OutputDocument> {
    const { keywords, pageSize, outputFile, source } = this.options;
    const startedAt = (this.options.now ?? (() => new Date()))().toISOString();
    this._lastReport = null;

    try {
      console.log("[1/3] fetching articles...");
      this._state = "fetching";
      const rawArticles = await source.search(keywords, pageSize);
      console.log(`[1/3] done: ${rawArticles.length} articles to summarize\n`);

      console.log("[2/3] summarizing...");
      this._state = "enriching";
      const outcomes: ArticleOutcome[] = [];
      const enriched = await this.enrich(rawArticles, outcomes);

      console.log("\n[3/3] writing output...");
      const doc = finalize(enriched, startedAt, outputFile, (stage) => {
        this._state = stage;
      });

      this._state = "done";
      const report: RunReport = {
        startedAt,
        fetched: rawArticles.length,
        enriched: enriched.length,
        skipped: rawArticles.length - enriched.length,
        written: doc.articles.length,
        outcomes,
      };
      this._lastReport = report;
      console.log(
        `[3/3] done: ${report.enriched} summarized, ${report.skipped} skipped, ${report.written} written`
      );
      return doc;
    } catch (err) {
      const stage = this._state;
      this._state = "failed";
      console.error(`[pipeline] run failed while ${stage}: ${describeError(err)}`);
      throw err;
    }
  }

  private async enrich(articles: RawArticle[], outcomes: ArticleOutcome[]): Promise<EnrichedArticle[]> {
    const enriched: EnrichedArticle[] = [];

    for (let i = 0; i < articles.length; i++) {
      const article = articles[i];
      const label = article.title.length > 30 ? `${article.title.slice(0, 30)}...` : article.title;
      const outcome: ArticleOutcome = { url: article.url, title: article.title, state: "fetched" };
      outcomes.push(outcome);

      console.log(`\n--- (${i + 1}/${articles.length}) ${label}`);
      outcome.state = "summarizing";

      try {
        const result = await this.options.summarizer.summarize(article.bodyText, label);
        if (!result.summary.trim() || !isArticleCategory(result.category)) {
          outcome.state = "skipped";
          outcome.error = "incomplete summary result";
          console.warn(`  -> skipped "${label}": ${outcome.error}`);
          continue;
        }

        enriched.push({
          title: article.title,
          summary: result.summary,
          url: article.url,
          category: result.category,
          date: article.publishedAt,
        });
        outcome.state = "enriched";
        console.log(`  -> ${result.category}`);
      } catch (err) {
        outcome.state = "skipped";
        outcome.error = describeError(err);
        console.warn(`  -> skipped "${label}": ${outcome.error}`);
      }
    }

    return enriched;
  }
}
