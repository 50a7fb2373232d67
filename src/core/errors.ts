/** Transport failure or a non-2xx HTTP status */
export class NetworkError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "NetworkError";
  }
}

/** Malformed XML, or a document that is neither a sitemap index nor a urlset */
export class ParseError extends Error {
  constructor(message: string, readonly url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ParseError";
  }
}

/** A required field is missing from a product page */
export class ScrapeError extends Error {
  constructor(message: string, readonly url: string, readonly field: string) {
    super(message);
    this.name = "ScrapeError";
  }
}

export class TranslationError extends Error {
  constructor(message: string, readonly code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TranslationError";
  }
}

/** Missing or invalid setting; fatal before any processing starts */
export class ConfigError extends Error {
  constructor(message: string, readonly key: string) {
    super(message);
    this.name = "ConfigError";
  }
}
