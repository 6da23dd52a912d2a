export { buildDocument, dedupeByUrl, serializeDocument } from "./document";
export type { EnrichedArticle, OutputDocument } from "./document";
export { finalize, writeDocument } from "./writer";
export type { FinalizeStage } from "./writer";
