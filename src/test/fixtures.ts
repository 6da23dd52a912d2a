import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function geminiReply(text: string): Response {
  return jsonResponse({
    candidates: [{ content: { parts: [{ text }], role: "model" }, finishReason: "STOP" }],
  });
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "ssb-news-"));
}
