import * as cheerio from "cheerio";
import { ScrapeError } from "../core/errors";
import { cleanText } from "../core/utils";
import { ProductFields } from "./types";

/** Selectors tried in order for each field; the first that matches wins */
const NAME_SELECTORS = [
  "h1[itemprop='name']",
  "h1.product-single__title",
  "h1.product__title",
  "h1.product-title",
  "h1",
];

const IMAGE_SELECTORS = [
  ".product-single__photo img",
  ".product__media img",
  ".product-gallery img",
  ".product-images img",
  "img[itemprop='image']",
];

const DESCRIPTION_SELECTORS = [
  ".product-single__description",
  ".product__description",
  ".product-description",
  ".description",
  "[itemprop='description']",
  ".product-detail",
];

const SPEC_SELECTORS = [
  ".product-single__specs-table",
  ".specs-table",
  ".product-specs",
  ".specifications",
  "table.specs",
  "[itemprop='additionalProperty']",
];

const SET_SELECTORS = [
  ".product-single__set-items",
  ".set-items",
  ".product-set",
  ".package-contents",
  ".included-items",
];

const FALLBACK_SECTIONS =
  ".product-info, .product-details, .product-information, .product-data";

const APPLICATION_PHRASES = [
  "ideal for",
  "perfect for",
  "used for",
  "designed for",
  "suitable for",
  "applications",
];

const APPLICATION_SPEC_KEYS = ["application", "use", "usage", "suitable"];

const BLOCK_TAGS = "p, li, div, h1, h2, h3, h4, h5, h6, dd, dt, td, th, tr";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function makeAbsolute(href: string, pageUrl: string): string {
  if (!href) return "";
  try {
    return new URL(href, pageUrl).href;
  } catch {
    return "";
  }
}

/**
 * Text of an HTML fragment with block boundaries turned into spaces,
 * so "<p>A</p><p>B</p>" reads "A B" rather than "AB".
 */
function blockText(html: string | null): string {
  if (!html) return "";
  const $fragment = cheerio.load(html, null, false);
  $fragment("br").replaceWith(" ");
  $fragment(BLOCK_TAGS).append(" ");
  return cleanText($fragment.root().text());
}

/**
 * Collect JSON-LD objects from every ld+json script, flattening arrays and @graph.
 */
function readJsonLd($: cheerio.CheerioAPI, debug: (msg: string) => void): JsonObject[] {
  const objects: JsonObject[] = [];
  const visit = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(visit);
    } else if (isObject(value)) {
      objects.push(value);
      if (Array.isArray(value["@graph"])) value["@graph"].forEach(visit);
    }
  };
  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).html();
    if (!raw) return;
    try {
      visit(JSON.parse(raw));
    } catch (err) {
      debug(`ignoring invalid JSON-LD block: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
  return objects;
}

function findProductJsonLd(objects: JsonObject[]): JsonObject | null {
  const isProduct = (o: JsonObject): boolean => {
    const type = o["@type"];
    if (Array.isArray(type)) return type.includes("Product");
    return type === "Product";
  };
  return objects.find(isProduct) ?? null;
}

function jsonLdString(value: unknown): string {
  if (typeof value === "string") return cleanText(value);
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return jsonLdString(value[0]);
  if (isObject(value)) return jsonLdString(value.url ?? value.name ?? "");
  return "";
}

function splitSentences(text: string): string[] {
  return text.split(/(?<=[.!?])\s+/).map(cleanText).filter(Boolean);
}

export interface ExtractOptions {
  debug?: boolean;
  /** Name used when the page has none, e.g. the sitemap's image caption */
  fallbackName?: string;
}

/**
 * Extract product fields from a loaded product page.
 * Optional fields resolve to empty values; a missing name throws ScrapeError.
 */
export function extractProduct(
  $: cheerio.CheerioAPI,
  sourceUrl: string,
  options: ExtractOptions = {}
): ProductFields {
  const debug = (msg: string): void => {
    if (options.debug) console.log(`     [debug] ${msg}`);
  };
  const productLd = findProductJsonLd(readJsonLd($, debug));

  // ── Name ──────────────────────────────────────────────────────────
  let name = "";
  for (const sel of NAME_SELECTORS) {
    name = cleanText($(sel).first().text());
    if (name) break;
  }
  if (!name) {
    name = cleanText($('meta[property="og:title"]').attr("content") ?? "");
  }
  if (!name && productLd) name = jsonLdString(productLd.name);
  if (!name && options.fallbackName) {
    name = cleanText(options.fallbackName);
    debug(`name from fallback: ${name}`);
  }
  if (!name) {
    throw new ScrapeError(`No product name found on ${sourceUrl}`, sourceUrl, "name");
  }

  // ── Image ─────────────────────────────────────────────────────────
  let imageUrl = makeAbsolute(
    $('meta[property="og:image"]').attr("content")?.trim() ?? "",
    sourceUrl
  );
  if (!imageUrl) {
    for (const sel of IMAGE_SELECTORS) {
      const img = $(sel).first();
      const src = img.attr("src") ?? img.attr("data-src") ?? "";
      imageUrl = makeAbsolute(src.trim(), sourceUrl);
      if (imageUrl) break;
    }
  }
  if (!imageUrl && productLd) {
    imageUrl = makeAbsolute(jsonLdString(productLd.image), sourceUrl);
  }

  // ── Description + applications ────────────────────────────────────
  let description = "";
  const applications: string[] = [];
  for (const sel of DESCRIPTION_SELECTORS) {
    const blocks = $(sel);
    if (!blocks.length) continue;
    description = blocks
      .map((_, el) => blockText($(el).html()))
      .get()
      .filter(Boolean)
      .join(" ");
    if (!description) continue;
    debug(`description from ${sel}`);
    for (const sentence of splitSentences(description)) {
      const lower = sentence.toLowerCase();
      if (APPLICATION_PHRASES.some((phrase) => lower.includes(phrase))) {
        applications.push(sentence);
      }
    }
    break;
  }
  if (!description && productLd) {
    description = jsonLdString(productLd.description);
  }

  // ── Specifications ────────────────────────────────────────────────
  const specs: Record<string, string> = {};
  const addSpec = (rawKey: string, rawValue: string): void => {
    const key = cleanText(rawKey).replace(/:$/, "");
    const value = cleanText(rawValue);
    if (!key || !value) return;
    specs[key] = value;
    if (APPLICATION_SPEC_KEYS.some((k) => key.toLowerCase().includes(k))) {
      applications.push(`${key}: ${value}`);
    }
  };

  for (const sel of SPEC_SELECTORS) {
    const tables = $(sel);
    if (!tables.length) continue;
    debug(`specifications from ${sel}`);
    tables.find("tr").each((_, tr) => {
      const cells = $(tr).children("th, td");
      if (cells.length < 2) return;
      addSpec(cells.eq(0).text(), cells.eq(1).text());
    });
    break;
  }

  if (productLd && Array.isArray(productLd.additionalProperty)) {
    for (const prop of productLd.additionalProperty) {
      if (isObject(prop) && prop.name !== undefined && prop.value !== undefined) {
        addSpec(jsonLdString(prop.name), jsonLdString(prop.value));
      }
    }
  }

  if (Object.keys(specs).length === 0) {
    $("dl").each((_, dl) => {
      const dts = $(dl).find("dt");
      const dds = $(dl).find("dd");
      const n = Math.min(dts.length, dds.length);
      for (let i = 0; i < n; i++) {
        addSpec(dts.eq(i).text(), dds.eq(i).text());
      }
    });
  }

  // ── Items in set ──────────────────────────────────────────────────
  const setItems: string[] = [];
  for (const sel of SET_SELECTORS) {
    const container = $(sel).first();
    if (!container.length) continue;
    debug(`set items from ${sel}`);
    container.find(".set-item, .item").each((_, item) => {
      const itemName = cleanText(
        $(item).find(".set-item__name, .item-name, .name").first().text()
      );
      if (itemName) setItems.push(itemName);
    });
    if (setItems.length === 0) {
      container.find("li").each((_, li) => {
        const text = cleanText($(li).text());
        if (text) setItems.push(text);
      });
    }
    break;
  }

  // ── Last resort: generic product information blocks ───────────────
  if (!description && Object.keys(specs).length === 0) {
    $(FALLBACK_SECTIONS).each((_, section) => {
      const text = blockText($(section).html());
      if (text && !description) description = text;
    });
  }

  debug(
    `parsed: description=${Boolean(description)}, specs=${Object.keys(specs).length}, ` +
      `set items=${setItems.length}, applications=${applications.length}`
  );

  return { name, imageUrl, description, specs, setItems, applications };
}
