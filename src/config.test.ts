import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";
import { DEFAULT_KEYWORDS } from "./news";

const credentials = { NEWS_API_KEY: "test-news-key", GEMINI_API_KEY: "test-gemini-key" };

describe("loadConfig", () => {
  it("applies defaults when only credentials are set", () => {
    const config = loadConfig(credentials);

    expect(config.newsApi).toEqual({
      apiKey: "test-news-key",
      endpoint: "https://newsapi.org/v2/everything",
      timeoutMs: 20_000,
    });
    expect(config.gemini).toEqual({
      apiKey: "test-gemini-key",
      apiBase: "https://generativelanguage.googleapis.com/v1beta",
      model: "gemini-2.5-flash",
      timeoutMs: 20_000,
    });
    expect(config.retry).toEqual({ maxAttempts: 3, delayMs: 5_000 });
    expect(config.keywords).toBe(DEFAULT_KEYWORDS);
    expect(config.pageSize).toBe(35);
    expect(config.outputFile).toBe("news.json");
  });

  it("lists every missing credential", () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ missing: ["NEWS_API_KEY", "GEMINI_API_KEY"] });
  });

  it("treats a blank credential as missing", () => {
    expect(() => loadConfig({ NEWS_API_KEY: "   ", GEMINI_API_KEY: "test-gemini-key" })).toThrow(
      "Missing required environment variables: NEWS_API_KEY"
    );
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...credentials,
      NEWS_KEYWORDS: " ISRO OR DRDO ",
      NEWS_PAGE_SIZE: "10",
      OUTPUT_FILE: "public/news.json",
      GEMINI_MODEL: "gemini-test",
      SUMMARIZE_MAX_ATTEMPTS: "5",
      SUMMARIZE_RETRY_DELAY_MS: "0",
      REQUEST_TIMEOUT_MS: "1000",
    });

    expect(config.keywords).toBe("ISRO OR DRDO");
    expect(config.pageSize).toBe(10);
    expect(config.outputFile).toBe("public/news.json");
    expect(config.gemini.model).toBe("gemini-test");
    expect(config.retry).toEqual({ maxAttempts: 5, delayMs: 0 });
    expect(config.newsApi.timeoutMs).toBe(1000);
    expect(config.gemini.timeoutMs).toBe(1000);
  });

  it("caps the page size at 100", () => {
    expect(loadConfig({ ...credentials, NEWS_PAGE_SIZE: "500" }).pageSize).toBe(100);
  });

  it("rejects non-integer numeric settings", () => {
    expect(() => loadConfig({ ...credentials, NEWS_PAGE_SIZE: "lots" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...credentials, SUMMARIZE_MAX_ATTEMPTS: "0" })).toThrow(
      'SUMMARIZE_MAX_ATTEMPTS must be an integer >= 1, got "0"'
    );
  });
});
