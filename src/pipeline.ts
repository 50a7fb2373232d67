import { AxiosInstance } from "axios";
import { readCodes, readWrittenCodes } from "./core/file-reader";
import { getErrorMessage } from "./core/http";
import { deduplicate, formatDuration, sleep } from "./core/utils";
import { composeDescription } from "./product/composer";
import { crawlProduct } from "./product/crawler";
import { appendRow, assertWritable } from "./product/exporter";
import {
  matchedCount,
  matchedUrl,
  matchProducts,
  NotFound,
  unmatchedCodes,
} from "./product/matcher";
import { ProductRecord } from "./product/types";
import { walkSitemap } from "./sitemap/walker";
import { TranslationInput, Translator } from "./translation/translator";
import { AppConfig, ProductOutcome, RunSummary, SitemapNode } from "./types";

export interface PipelineDeps {
  http: AxiosInstance;
  /** null disables translation; rows then carry an empty Spanish description */
  translator: Translator | null;
}

interface WorkItem {
  code: string;
  url: string | NotFound;
}

function toTranslationInput(record: ProductRecord): TranslationInput {
  return {
    code: record.code,
    name: record.name,
    raw_description: record.description,
    specifications: record.specs,
    items_in_set: record.setItems,
  };
}

function emptySummary(config: AppConfig): RunSummary {
  return {
    sitemap_url: config.sitemapUrl,
    input_created: false,
    total_codes: 0,
    total_leaf_urls: 0,
    total_matched: 0,
    total_not_found: 0,
    total_processed: 0,
    total_written: 0,
    total_translated: 0,
    total_skipped: 0,
    failures: [],
    elapsed_ms: 0,
  };
}

/**
 * Scrape, describe, translate and write one matched product.
 * Fetch/scrape failures skip the product; a translation failure still writes
 * the row, with an empty Spanish description.
 */
async function processProduct(
  item: WorkItem,
  leaf: SitemapNode | undefined,
  config: AppConfig,
  deps: PipelineDeps
): Promise<ProductOutcome> {
  const { code } = item;
  if (item.url === NotFound) {
    appendRow(config.outputCsv, {
      code,
      name: "",
      imageUrl: "",
      url: "",
      spanishDescription: "",
    });
    return { status: "not_found", code };
  }

  const url = item.url;
  const crawled = await crawlProduct(url, deps.http, {
    retries: config.retries,
    debug: config.debug,
    fallbackName: leaf?.imageCaption,
  });
  if (!crawled.success) {
    return { status: "skipped", code, url, stage: crawled.stage, error: crawled.error };
  }

  const record: ProductRecord = {
    ...crawled.data,
    code,
    url,
    imageUrl: crawled.data.imageUrl || leaf?.imageUrl || "",
  };
  const english = composeDescription(record, { brand: config.brand });
  if (config.debug) {
    console.log(`     [debug] English description:\n${english}`);
  }

  let spanish = "";
  let translationError: string | undefined;
  if (deps.translator) {
    try {
      spanish = await deps.translator.translate(toTranslationInput(record), english);
    } catch (err) {
      translationError = getErrorMessage(err);
    }
  }

  appendRow(config.outputCsv, {
    code,
    name: record.name,
    imageUrl: record.imageUrl,
    url,
    spanishDescription: spanish,
  });

  return {
    status: "written",
    code,
    url,
    translated: Boolean(spanish),
    translationError,
  };
}

/**
 * Run the whole flow: codes → sitemap walk → match → scrape → compose →
 * translate → append rows. Products are handled one at a time.
 * @throws when the root sitemap cannot be loaded or the output is not writable
 */
export async function runPipeline(
  config: AppConfig,
  deps: PipelineDeps
): Promise<RunSummary> {
  const startTime = Date.now();
  const summary = emptySummary(config);

  // ── Step 1: Load codes ────────────────────────────────────────────
  console.log(`Step 1: Reading product codes from ${config.inputCsv}...`);
  const input = readCodes(config.inputCsv);
  if (input.created) {
    console.log(`   Input file not found, created a template at ${config.inputCsv}`);
    console.log("   Add your product codes to it and run again.");
    summary.input_created = true;
    return summary;
  }

  let codes = config.deduplicateCodes ? deduplicate(input.codes) : input.codes;
  if (codes.length < input.codes.length) {
    console.log(`   Removed ${input.codes.length - codes.length} duplicate code(s)`);
  }
  if (config.skipExisting) {
    const written = new Set(
      [...readWrittenCodes(config.outputCsv)].map((code) => code.toLowerCase())
    );
    const before = codes.length;
    codes = codes.filter((code) => !written.has(code.toLowerCase()));
    if (codes.length < before) {
      console.log(`   Skipping ${before - codes.length} code(s) already in ${config.outputCsv}`);
    }
  }
  summary.total_codes = codes.length;
  console.log(`   Found ${codes.length} product code(s)\n`);

  if (codes.length === 0) {
    console.log("Nothing to process. Exiting.");
    summary.elapsed_ms = Date.now() - startTime;
    return summary;
  }
  assertWritable(config.outputCsv);

  // ── Step 2: Walk sitemaps ─────────────────────────────────────────
  console.log(`Step 2: Walking sitemap ${config.sitemapUrl}...`);
  const walk = await walkSitemap(
    config.sitemapUrl,
    {
      recursive: config.recursive,
      sitemapFilter: config.sitemapFilter,
      urlFilter: config.urlFilter,
      debug: config.debug,
    },
    deps.http
  );
  summary.total_leaf_urls = walk.leafUrls.length;
  console.log(`   Found ${walk.leafUrls.length} product URL(s)`);
  if (walk.failures.length > 0) {
    console.log(`   ${walk.failures.length} sitemap(s) could not be read`);
  }
  console.log("");

  // ── Step 3: Match codes ───────────────────────────────────────────
  console.log("Step 3: Matching product codes...");
  const matches = matchProducts(codes, walk.leafUrls);
  const missing = unmatchedCodes(matches);
  summary.total_matched = matchedCount(matches);
  summary.total_not_found = missing.length;
  console.log(`   Matched ${summary.total_matched} of ${matches.size} code(s)`);
  if (missing.length > 0) {
    console.warn(
      `   Warning: ${missing.length} code(s) not found in the sitemap` +
        (config.forceMode ? " (force mode: rows will still be written)" : "")
    );
    for (const code of missing.slice(0, 10)) console.warn(`     - ${code}`);
    if (missing.length > 10) console.warn(`     ... and ${missing.length - 10} more`);
  }
  console.log("");

  const items: WorkItem[] = [];
  for (const code of codes) {
    const url = matchedUrl(matches, code);
    if (url !== NotFound || config.forceMode) items.push({ code, url });
  }
  const work =
    config.maxProducts > 0 ? items.slice(0, config.maxProducts) : items;
  if (work.length < items.length) {
    console.log(`   Limiting processing to ${config.maxProducts} product(s)`);
  }

  // ── Step 4: Process products ──────────────────────────────────────
  console.log(`Step 4: Processing ${work.length} product(s)...`);
  const leavesByUrl = new Map(walk.leaves.map((leaf) => [leaf.url, leaf]));

  for (const [i, item] of work.entries()) {
    const leaf = item.url === NotFound ? undefined : leavesByUrl.get(item.url);
    const outcome = await processProduct(item, leaf, config, deps);
    summary.total_processed++;

    const progress = `   [${i + 1}/${work.length}]`;
    switch (outcome.status) {
      case "written":
        summary.total_written++;
        if (outcome.translated) summary.total_translated++;
        console.log(`${progress}  + ${outcome.code} ${outcome.url}`);
        if (outcome.translationError) {
          console.error(`     x ${outcome.code} translation failed: ${outcome.translationError}`);
          summary.failures.push({
            code: outcome.code,
            url: outcome.url,
            stage: "translate",
            error: outcome.translationError,
          });
        }
        break;
      case "not_found":
        summary.total_written++;
        console.log(`${progress}  ? ${outcome.code} not found, empty row written`);
        break;
      case "skipped":
        summary.total_skipped++;
        console.error(`${progress}  x ${outcome.code} ${outcome.url} (${outcome.stage}): ${outcome.error}`);
        summary.failures.push({
          code: outcome.code,
          url: outcome.url,
          stage: outcome.stage,
          error: outcome.error,
        });
        break;
    }

    if (i < work.length - 1 && config.delayMs > 0) {
      await sleep(config.delayMs);
    }
  }

  summary.elapsed_ms = Date.now() - startTime;
  printSummary(summary, config.outputCsv);
  return summary;
}

function printSummary(summary: RunSummary, outputCsv: string): void {
  console.log(`\nDone in ${formatDuration(summary.elapsed_ms)}`);
  console.log(`   Codes:        ${summary.total_codes}`);
  console.log(`   Sitemap URLs: ${summary.total_leaf_urls}`);
  console.log(`   Matched:      ${summary.total_matched}`);
  console.log(`   Not found:    ${summary.total_not_found}`);
  console.log(`   Processed:    ${summary.total_processed}`);
  console.log(`   Written:      ${summary.total_written}`);
  console.log(`   Translated:   ${summary.total_translated}`);
  console.log(`   Skipped:      ${summary.total_skipped}`);
  console.log(`   Output:       ${outputCsv}`);

  if (summary.failures.length > 0) {
    console.log(`\n   Failed products (${summary.failures.length}):`);
    for (const f of summary.failures) {
      console.log(`     x ${f.code} [${f.stage}] ${f.url}: ${f.error}`);
    }
  }
}
