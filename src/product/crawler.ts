import * as fs from "fs";
import { AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { fetchText, getErrorMessage } from "../core/http";
import { extractProduct } from "./extractor";
import { ProductCrawlResult } from "./types";

export interface CrawlProductOptions {
  retries?: number;
  debug?: boolean;
  /** Where to dump the fetched HTML when debugging */
  debugHtmlPath?: string;
  /** Product name to use when the page carries none */
  fallbackName?: string;
}

/**
 * Fetch a product page and extract its fields.
 * Fetch failures and missing required fields come back as a failed result.
 */
export async function crawlProduct(
  url: string,
  http: AxiosInstance,
  options: CrawlProductOptions = {}
): Promise<ProductCrawlResult> {
  let html: string;
  try {
    html = await fetchText(http, url, undefined, options.retries ?? 0);
  } catch (err) {
    return { success: false, url, stage: "fetch", error: getErrorMessage(err) };
  }

  if (options.debug) {
    fs.writeFileSync(options.debugHtmlPath ?? "debug.html", html, "utf-8");
    if (html.length < 1000) {
      console.warn(
        `     Warning: response is only ${html.length} bytes, might not be a product page`
      );
    }
  }

  try {
    const $ = cheerio.load(html);
    const data = extractProduct($, url, {
      debug: options.debug,
      fallbackName: options.fallbackName,
    });
    return { success: true, data };
  } catch (err) {
    return { success: false, url, stage: "scrape", error: getErrorMessage(err) };
  }
}
