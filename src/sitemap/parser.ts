import { AxiosInstance } from "axios";
import { XMLParser } from "fast-xml-parser";
import { ParseError } from "../core/errors";
import { fetchText } from "../core/http";
import { SitemapNode } from "../types";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === "sitemap" || name === "url" || name === "image",
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNodes(value: unknown): XmlNode[] {
  if (Array.isArray(value)) return value.filter(isNode);
  return isNode(value) ? [value] : [];
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  if (isNode(value) && typeof value["#text"] === "string") {
    return value["#text"].trim();
  }
  return "";
}

/**
 * Fetch a sitemap document and list its entries.
 * @throws NetworkError on transport failure or non-2xx status
 * @throws ParseError on malformed XML or an unknown root element
 */
export async function fetchSitemap(
  url: string,
  http: AxiosInstance
): Promise<SitemapNode[]> {
  const xml = await fetchText(http, url, "application/xml, text/xml, */*");
  return parseSitemapXml(xml, url);
}

/**
 * Parse sitemap XML into nodes, in document order.
 * <sitemapindex><sitemap><loc> entries become "index" nodes,
 * <urlset><url><loc> entries become "leaf" nodes carrying the first
 * <image:image> of the entry, when present.
 * @param xml - Raw sitemap document
 * @param url - Where the document came from, for error messages
 * @returns Nodes for every entry with a <loc>
 * @throws ParseError on malformed XML or an unknown root element
 */
export function parseSitemapXml(xml: string, url: string): SitemapNode[] {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml, true);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Malformed XML in ${url}: ${reason}`, url, {
      cause: err,
    });
  }
  if (!isNode(parsed)) {
    throw new ParseError(`Empty XML document at ${url}`, url);
  }

  if ("sitemapindex" in parsed) {
    const index = parsed.sitemapindex;
    const entries = isNode(index) ? asNodes(index.sitemap) : [];
    return entries
      .map((s) => textOf(s.loc))
      .filter(Boolean)
      .map((loc): SitemapNode => ({ url: loc, kind: "index" }));
  }

  if ("urlset" in parsed) {
    const urlset = parsed.urlset;
    const entries = isNode(urlset) ? asNodes(urlset.url) : [];
    const nodes: SitemapNode[] = [];
    for (const entry of entries) {
      const loc = textOf(entry.loc);
      if (!loc) continue;
      const node: SitemapNode = { url: loc, kind: "leaf" };
      // Google image extension: <image:image><image:loc/><image:caption/>
      const image = asNodes(entry.image)[0];
      if (image) {
        const imageUrl = textOf(image.loc);
        const caption = textOf(image.caption);
        if (imageUrl) node.imageUrl = imageUrl;
        if (caption) node.imageCaption = caption;
      }
      nodes.push(node);
    }
    return nodes;
  }

  throw new ParseError(
    `${url} is neither a sitemap index nor a urlset`,
    url
  );
}

/**
 * Keep the URLs a pattern accepts. Without a pattern every URL passes.
 * @param urls - Candidate URLs, order preserved
 * @param pattern - Filter such as SITEMAP_FILTER or URL_FILTER
 * @returns The accepted URLs
 */
export function filterUrls(urls: string[], pattern?: RegExp | null): string[] {
  if (!pattern) return urls;
  return urls.filter((url) => pattern.test(url));
}
