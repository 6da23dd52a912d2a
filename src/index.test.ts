import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config";
import { SourceError } from "./errors";
import { createPipeline, main, runOnce } from "./index";
import { NewsPipeline } from "./pipeline";

describe("createPipeline", () => {
  it("wires a pipeline from the loaded config without starting it", () => {
    const config = loadConfig({ NEWS_API_KEY: "test-news-key", GEMINI_API_KEY: "test-gemini-key" });

    const pipeline = createPipeline(config);

    expect(pipeline).toBeInstanceOf(NewsPipeline);
    expect(pipeline.state).toBe("idle");
    expect(pipeline.lastReport).toBeNull();
  });
});

describe("runOnce", () => {
  it("returns 1 and logs a failed run exactly once", async () => {
    const pipeline = new NewsPipeline({
      keywords: "ISRO",
      pageSize: 5,
      outputFile: "unused.json",
      source: {
        search: async () => {
          throw new SourceError("NewsAPI error: rate limited");
        },
      },
      summarizer: { summarize: async () => ({ summary: "x", category: "National" }) },
    });

    await expect(runOnce(pipeline)).resolves.toBe(1);
    expect(vi.mocked(console.error).mock.calls).toEqual([
      ["[pipeline] run failed while fetching: NewsAPI error: rate limited"],
    ]);
  });
});

describe("main", () => {
  it("returns 1 on missing credentials without starting a run", async () => {
    await expect(main({})).resolves.toBe(1);
    expect(vi.mocked(console.error).mock.calls).toEqual([
      ["[config] Missing required environment variables: NEWS_API_KEY, GEMINI_API_KEY"],
    ]);
  });
});
