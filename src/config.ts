import { ConfigError } from "./errors";
import { DEFAULT_KEYWORDS } from "./news/keywords";

export interface NewsApiConfig {
  apiKey: string;
  endpoint: string;
  timeoutMs: number;
}

export interface GeminiConfig {
  apiKey: string;
  apiBase: string;
  model: string;
  timeoutMs: number;
}

export interface RetrySettings {
  maxAttempts: number;
  delayMs: number;
}

export interface AppConfig {
  newsApi: NewsApiConfig;
  gemini: GeminiConfig;
  retry: RetrySettings;
  keywords: string;
  pageSize: number;
  outputFile: string;
}

type Env = Record<string, string | undefined>;

/**
 * Builds the run configuration from environment variables.
 * Credentials are required; everything else has a default.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const newsKey = env.NEWS_API_KEY?.trim();
  const geminiKey = env.GEMINI_API_KEY?.trim();

  const missing: string[] = [];
  if (!newsKey) missing.push("NEWS_API_KEY");
  if (!geminiKey) missing.push("GEMINI_API_KEY");
  if (!newsKey || !geminiKey) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`, missing);
  }

  const timeoutMs = readInt(env, "REQUEST_TIMEOUT_MS", 20_000, 1);

  return {
    newsApi: {
      apiKey: newsKey,
      endpoint: env.NEWS_API_URL || "https://newsapi.org/v2/everything",
      timeoutMs,
    },
    gemini: {
      apiKey: geminiKey,
      apiBase: env.GEMINI_API_BASE || "https://generativelanguage.googleapis.com/v1beta",
      model: env.GEMINI_MODEL || "gemini-2.5-flash",
      timeoutMs,
    },
    retry: {
      maxAttempts: readInt(env, "SUMMARIZE_MAX_ATTEMPTS", 3, 1),
      delayMs: readInt(env, "SUMMARIZE_RETRY_DELAY_MS", 5_000, 0),
    },
    keywords: env.NEWS_KEYWORDS?.trim() || DEFAULT_KEYWORDS,
    // NewsAPI caps pageSize at 100
    pageSize: Math.min(readInt(env, "NEWS_PAGE_SIZE", 35, 1), 100),
    outputFile: env.OUTPUT_FILE || "news.json",
  };
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}
