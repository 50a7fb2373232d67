#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config";
import { ConfigError, NetworkError, ParseError } from "./core/errors";
import { createHttpClient, getErrorMessage } from "./core/http";
import { runPipeline } from "./pipeline";
import { OpenAiTranslator } from "./translation/translator";
import { AppConfig } from "./types";

function printOptions(config: AppConfig): void {
  console.log(`   Sitemap:     ${config.sitemapUrl}`);
  console.log(`   Input:       ${config.inputCsv}`);
  console.log(`   Output:      ${config.outputCsv}`);
  console.log(`   Recursive:   ${config.recursive}`);
  console.log(`   Max:         ${config.maxProducts || "unbounded"}`);
  console.log(`   Force mode:  ${config.forceMode}`);
  if (config.sitemapFilter) console.log(`   Sitemap filter: ${config.sitemapFilter.source}`);
  if (config.urlFilter) console.log(`   URL filter:     ${config.urlFilter.source}`);
  console.log("");
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      console.error("   Set it in the environment or in a .env file.");
      process.exit(1);
    }
    throw err;
  }

  console.log(`Sitemap Listing Builder v1.0${config.debug ? "  [debug]" : ""}\n`);
  printOptions(config);

  if (!config.openaiApiKey) {
    console.warn(
      "Warning: OPENAI_API_KEY not set. Translation is disabled; rows will have an empty Spanish description.\n"
    );
  }

  const translator = config.openaiApiKey
    ? new OpenAiTranslator({
        apiKey: config.openaiApiKey,
        model: config.openaiModel,
        listingNote: config.listingNote,
      })
    : null;

  const http = createHttpClient({ timeout: config.timeout });
  await runPipeline(config, { http, translator });
}

main().catch((err: unknown) => {
  if (err instanceof NetworkError || err instanceof ParseError) {
    console.error(`\nError: Could not read sitemap at ${err.url}`);
    console.error(`   ${err.message}`);
  } else {
    console.error(`\nError: ${getErrorMessage(err)}`);
  }
  process.exit(1);
});
