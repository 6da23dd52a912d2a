import * as v from "valibot";
import type { GeminiConfig } from "../config";
import { SummarizeError, describeError, isAbortError } from "../errors";

const GenerateContentResponseSchema = v.object({
  candidates: v.optional(
    v.array(
      v.object({
        content: v.optional(
          v.object({
            parts: v.optional(v.array(v.object({ text: v.optional(v.string()) }))),
          })
        ),
      })
    )
  ),
});

/**
 * generateContent endpoint for the configured model.
 * The API key travels in the query string.
 */
export function buildGenerateUrl(config: Pick<GeminiConfig, "apiBase" | "model" | "apiKey">): string {
  const base = config.apiBase.replace(/\/+$/, "");
  const url = new URL(`${base}/models/${encodeURIComponent(config.model)}:generateContent`);
  url.searchParams.set("key", config.apiKey);
  return url.toString();
}

export class GeminiClient {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: GeminiConfig,
    fetchImpl: typeof fetch = fetch
  ) {
    this.fetchImpl = fetchImpl;
  }

  /**
   * One generateContent call; returns the first candidate's text
   */
  async generateText(prompt: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const res = await this.fetchImpl(buildGenerateUrl(this.config), {
        method: "POST",
        signal: controller.signal,
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ contents: [{ parts: [{ text: prompt }] }] }),
      });

      if (!res.ok) {
        const detail = (await res.text()).slice(0, 200);
        throw new SummarizeError("http", `Gemini HTTP ${res.status}: ${detail}`, {
          status: res.status,
        });
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new SummarizeError("malformed", "Gemini returned a non-JSON body", { cause: err });
      }

      const parsed = v.safeParse(GenerateContentResponseSchema, body);
      if (!parsed.success) {
        throw new SummarizeError("malformed", `Unexpected Gemini response: ${parsed.issues[0].message}`);
      }

      const text = parsed.output.candidates?.[0]?.content?.parts?.[0]?.text;
      if (!text) {
        throw new SummarizeError("empty", "Gemini returned no text candidate");
      }
      return text;
    } catch (err) {
      if (err instanceof SummarizeError) throw err;
      if (isAbortError(err)) {
        throw new SummarizeError("timeout", `Gemini call timed out after ${this.config.timeoutMs}ms`, {
          cause: err,
        });
      }
      throw new SummarizeError("network", `Gemini call failed: ${describeError(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
