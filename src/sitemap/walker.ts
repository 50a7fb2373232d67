import { AxiosInstance } from "axios";
import { getErrorMessage } from "../core/http";
import { SitemapFailure, SitemapNode, WalkOptions, WalkResult } from "../types";
import { fetchSitemap, filterUrls } from "./parser";

interface WalkContext {
  http: AxiosInstance;
  options: WalkOptions;
  visited: Set<string>;
  failures: SitemapFailure[];
}

function keepLeaves(nodes: SitemapNode[], filter?: RegExp | null): SitemapNode[] {
  const leaves = nodes.filter((n) => n.kind === "leaf");
  const accepted = new Set(filterUrls(leaves.map((n) => n.url), filter));
  return leaves.filter((n) => accepted.has(n.url));
}

/**
 * Walk a sitemap hierarchy from its root and aggregate leaf URLs.
 *
 * A root urlset yields its own leaves. A root index lists its children and,
 * when `recursive` is set, each child is visited in listed order (nested
 * indexes depth-first). A child that fails to load is logged and contributes
 * zero leaves; only a failure of the root itself is thrown. Sitemaps already
 * visited are skipped so a cyclic index cannot loop.
 */
export async function walkSitemap(
  rootUrl: string,
  options: WalkOptions,
  http: AxiosInstance
): Promise<WalkResult> {
  console.log(`   Fetching: ${rootUrl}`);
  const rootNodes = await fetchSitemap(rootUrl, http);

  const ctx: WalkContext = {
    http,
    options,
    visited: new Set([rootUrl]),
    failures: [],
  };
  const result: WalkResult = {
    leafUrls: [],
    leaves: [],
    childSitemaps: [],
    countsPerSubSitemap: new Map(),
    failures: ctx.failures,
  };

  const children = rootNodes.filter((n) => n.kind === "index").map((n) => n.url);
  if (children.length === 0) {
    const leaves = keepLeaves(rootNodes, options.urlFilter);
    result.leaves.push(...leaves);
    result.leafUrls.push(...leaves.map((n) => n.url));
    result.countsPerSubSitemap.set(rootUrl, leaves.length);
    return result;
  }

  result.childSitemaps = filterUrls(children, options.sitemapFilter);
  console.log(
    `   Found sitemap index with ${children.length} child sitemap(s)` +
      (result.childSitemaps.length < children.length
        ? `, ${result.childSitemaps.length} after filter`
        : "")
  );

  if (!options.recursive) {
    for (const child of result.childSitemaps) {
      console.log(`     - ${child} (not descended)`);
    }
    return result;
  }

  for (const child of result.childSitemaps) {
    if (ctx.visited.has(child)) {
      console.warn(`   Warning: ${child} listed twice, skipping`);
      continue;
    }
    const leaves = await collectLeaves(child, ctx);
    result.leaves.push(...leaves);
    result.leafUrls.push(...leaves.map((n) => n.url));
    result.countsPerSubSitemap.set(child, leaves.length);
    console.log(`   ${child}: ${leaves.length} URLs`);
  }

  return result;
}

async function collectLeaves(url: string, ctx: WalkContext): Promise<SitemapNode[]> {
  if (ctx.visited.has(url)) {
    console.warn(`   Warning: ${url} already visited, skipping`);
    return [];
  }
  ctx.visited.add(url);

  let nodes: SitemapNode[];
  try {
    nodes = await fetchSitemap(url, ctx.http);
  } catch (err) {
    const message = getErrorMessage(err);
    console.error(`   x Sitemap ${url}: ${message}`);
    ctx.failures.push({ url, error: message });
    return [];
  }

  const leaves = keepLeaves(nodes, ctx.options.urlFilter);
  const nested = nodes.filter((n) => n.kind === "index");
  if (ctx.options.debug) {
    console.log(
      `     [debug] ${url}: ${leaves.length} leaf URL(s), ${nested.length} nested sitemap(s)`
    );
  }
  for (const child of nested) {
    leaves.push(...(await collectLeaves(child.url, ctx)));
  }
  return leaves;
}
