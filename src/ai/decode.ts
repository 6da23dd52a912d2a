import * as v from "valibot";
import { CATEGORIES } from "./prompts";
import type { ArticleCategory } from "./prompts";

export interface AiResult {
  summary: string;
  category: ArticleCategory;
}

export type DecodeResult = { ok: true; value: AiResult } | { ok: false; error: string };

const AiResultSchema = v.object({
  summary: v.pipe(v.string("summary must be a string"), v.trim(), v.nonEmpty("summary is empty")),
  category: v.picklist(CATEGORIES, "category is not one of the allowed values"),
});

// the model likes to wrap JSON in ```json ... ```
export function stripCodeFences(raw: string): string {
  return raw.replace(/```(?:json)?\s*/gi, "").trim();
}

/**
 * Model text → AiResult.
 * Unparsable JSON, missing keys and unknown categories all come back as { ok: false }.
 */
export function decodeAiResult(raw: string): DecodeResult {
  const cleaned = stripCodeFences(raw);
  if (!cleaned) return { ok: false, error: "empty response text" };

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = v.safeParse(AiResultSchema, json);
  if (!parsed.success) {
    return { ok: false, error: parsed.issues[0].message };
  }

  return { ok: true, value: { summary: parsed.output.summary, category: parsed.output.category } };
}
