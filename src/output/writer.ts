import fs from "node:fs";
import path from "node:path";
import { WriteError } from "../errors";
import { buildDocument, dedupeByUrl, serializeDocument } from "./document";
import type { EnrichedArticle, OutputDocument } from "./document";

/**
 * Replaces the file at `outputPath` with the whole document in one write.
 */
export function writeDocument(doc: OutputDocument, outputPath: string): void {
  const resolved = path.resolve(outputPath);

  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, serializeDocument(doc), "utf-8");
  } catch (err) {
    throw new WriteError(resolved, err);
  }
}

export type FinalizeStage = "deduplicating" | "writing";

/**
 * Dedupe → wrap with the run timestamp → write
 */
export function finalize(
  articles: readonly EnrichedArticle[],
  timestamp: string,
  outputPath: string,
  onStage?: (stage: FinalizeStage) => void
): OutputDocument {
  onStage?.("deduplicating");
  const unique = dedupeByUrl(articles);
  console.log(`[output] ${articles.length} enriched, ${unique.length} after dedupe`);

  const doc = buildDocument(unique, timestamp);
  onStage?.("writing");
  writeDocument(doc, outputPath);

  console.log(`[output] wrote ${outputPath} (${unique.length} articles)`);
  return doc;
}
