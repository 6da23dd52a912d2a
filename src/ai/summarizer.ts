import { SummarizeError, describeError } from "../errors";
import { withRetry, DEFAULT_RETRY_POLICY } from "../lib/retry";
import type { RetryPolicy } from "../lib/retry";
import type { GeminiClient } from "./client";
import { decodeAiResult } from "./decode";
import type { AiResult } from "./decode";
import { buildPrompt } from "./prompts";

export interface Summarizer {
  summarize(bodyText: string, label?: string): Promise<AiResult>;
}

export type TextGenerator = Pick<GeminiClient, "generateText">;

export interface SummarizerOptions {
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Single attempt: prompt → model text → decoded result.
 * A reply that does not decode is a SummarizeError("malformed").
 */
export async function summarizeOnce(generator: TextGenerator, bodyText: string): Promise<AiResult> {
  const text = await generator.generateText(buildPrompt(bodyText));
  const decoded = decodeAiResult(text);

  if (!decoded.ok) {
    throw new SummarizeError("malformed", `Unusable model output: ${decoded.error}`);
  }
  return decoded.value;
}

/**
 * Summarize + categorize with a bounded retry.
 * Rejects with the last SummarizeError once every attempt has failed.
 */
export class ArticleSummarizer implements Summarizer {
  private readonly retry: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly generator: TextGenerator,
    options: SummarizerOptions = {}
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  async summarize(bodyText: string, label = ""): Promise<AiResult> {
    try {
      return await withRetry(() => summarizeOnce(this.generator, bodyText), this.retry, {
        sleep: this.sleep,
        onFailure: ({ attempt, maxAttempts, error }) => {
          const next = attempt < maxAttempts ? `, retrying in ${this.retry.delayMs}ms` : "";
          console.warn(
            `[ai] attempt ${attempt}/${maxAttempts} failed for "${label}": ${describeError(error)}${next}`
          );
        },
      });
    } catch (err) {
      if (err instanceof SummarizeError) throw err;
      throw new SummarizeError("network", `Summarization failed: ${describeError(err)}`, { cause: err });
    }
  }
}
