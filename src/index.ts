#!/usr/bin/env node
import "dotenv/config";
import { ArticleSummarizer, GeminiClient } from "./ai";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { ConfigError, describeError } from "./errors";
import { NewsApiClient } from "./news";
import { NewsPipeline } from "./pipeline";

export function createPipeline(config: AppConfig): NewsPipeline {
  return new NewsPipeline({
    keywords: config.keywords,
    pageSize: config.pageSize,
    outputFile: config.outputFile,
    source: new NewsApiClient(config.newsApi),
    summarizer: new ArticleSummarizer(new GeminiClient(config.gemini), { retry: config.retry }),
  });
}

/**
 * Exit code for one run. Run failures are logged by the pipeline itself.
 */
export async function runOnce(pipeline: NewsPipeline): Promise<number> {
  try {
    await pipeline.run();
    return 0;
  } catch {
    return 1;
  }
}

export async function main(env: Record<string, string | undefined> = process.env): Promise<number> {
  console.log("=== news update started ===\n");

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`[config] ${err.message}`);
    return 1;
  }
  console.log(`[config] output=${config.outputFile} pageSize=${config.pageSize} model=${config.gemini.model}`);

  const code = await runOnce(createPipeline(config));
  console.log(`\n=== news update ${code === 0 ? "finished" : "failed"} ===`);
  return code;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error("[pipeline] fatal:", describeError(err));
      process.exitCode = 1;
    }
  );
}
