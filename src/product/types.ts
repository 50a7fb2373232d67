/** Everything extracted from one product detail page */
export interface ProductFields {
  name: string;
  imageUrl: string;
  description: string;
  /** Specification label → value, in page order */
  specs: Record<string, string>;
  setItems: string[];
  applications: string[];
}

export interface ProductRecord extends ProductFields {
  code: string;
  url: string;
}

/** One line of the output CSV */
export interface OutputRow {
  code: string;
  name: string;
  imageUrl: string;
  url: string;
  spanishDescription: string;
}

export type ProductCrawlResult =
  | { success: true; data: ProductFields }
  | { success: false; url: string; stage: "fetch" | "scrape"; error: string };
