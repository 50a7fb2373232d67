/** Runtime configuration, built once from the environment by loadConfig() */
export interface AppConfig {
  sitemapUrl: string;
  inputCsv: string;
  outputCsv: string;
  recursive: boolean;
  /** 0 = unbounded */
  maxProducts: number;
  debug: boolean;
  forceMode: boolean;
  openaiApiKey: string | null;
  openaiModel: string;
  sitemapFilter: RegExp | null;
  urlFilter: RegExp | null;
  brand: string | null;
  listingNote: string | null;
  deduplicateCodes: boolean;
  skipExisting: boolean;
  timeout: number;
  delayMs: number;
  retries: number;
}

/** One <loc> entry of a sitemap document */
export interface SitemapNode {
  url: string;
  kind: "index" | "leaf";
  imageUrl?: string;
  imageCaption?: string;
}

export interface SitemapFailure {
  url: string;
  error: string;
}

export interface WalkOptions {
  recursive: boolean;
  sitemapFilter?: RegExp | null;
  urlFilter?: RegExp | null;
  debug?: boolean;
}

export interface WalkResult {
  /** Leaf URLs in document order */
  leafUrls: string[];
  leaves: SitemapNode[];
  /** Child sitemaps listed by the root index */
  childSitemaps: string[];
  /** Leaves found beneath each direct child of the root (or the root itself when it is a urlset) */
  countsPerSubSitemap: Map<string, number>;
  failures: SitemapFailure[];
}

/** Per-product outcome, aggregated into the RunSummary */
export type ProductOutcome =
  | {
      status: "written";
      code: string;
      url: string;
      translated: boolean;
      translationError?: string;
    }
  | { status: "not_found"; code: string }
  | {
      status: "skipped";
      code: string;
      url: string;
      stage: "fetch" | "scrape";
      error: string;
    };

export interface RunFailure {
  code: string;
  url: string;
  stage: string;
  error: string;
}

/** Statistics printed at the end of a run */
export interface RunSummary {
  sitemap_url: string;
  input_created: boolean;
  total_codes: number;
  total_leaf_urls: number;
  total_matched: number;
  total_not_found: number;
  total_processed: number;
  total_written: number;
  total_translated: number;
  total_skipped: number;
  failures: RunFailure[];
  elapsed_ms: number;
}
