/** Marker for an input code with no product URL in the sitemap */
export const NotFound: unique symbol = Symbol("NotFound");
export type NotFound = typeof NotFound;

/** Input code → matched product URL, in input order */
export type MatchResult = Map<string, string | NotFound>;

/**
 * Final path segment of a URL, lower-cased, ignoring query, fragment and
 * trailing slashes. Falls back to the raw string for relative input.
 */
export function finalSegment(url: string): string {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    path = url.split(/[?#]/)[0];
  }
  const segments = path.split("/").filter(Boolean);
  const last = segments[segments.length - 1] ?? "";
  return decodeSegment(last).toLowerCase();
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * A URL matches a code when the code equals its final path segment, or the
 * last "-" / "_" delimited token of that segment. Case-insensitive.
 * @param url - Leaf URL from the sitemap
 * @param code - Product code from the input file
 */
export function urlMatchesCode(url: string, code: string): boolean {
  const wanted = code.trim().toLowerCase();
  if (!wanted) return false;
  const segment = finalSegment(url);
  if (segment === wanted) return true;
  const tokens = segment.split(/[-_]/);
  return tokens[tokens.length - 1] === wanted;
}

/**
 * Resolve each code to the first leaf URL (in aggregation order) that matches.
 * @param codes - Product codes in input order
 * @param leafUrls - Leaf URLs in the order the walk found them
 * @returns Every code, mapped to its URL or NotFound
 */
export function matchProducts(codes: string[], leafUrls: string[]): MatchResult {
  const result: MatchResult = new Map();
  for (const code of codes) {
    const url = leafUrls.find((candidate) => urlMatchesCode(candidate, code));
    result.set(code, url ?? NotFound);
  }
  return result;
}

/**
 * Codes no sitemap URL matched.
 * @param result - Output of matchProducts
 * @returns The unmatched codes, in input order
 */
export function unmatchedCodes(result: MatchResult): string[] {
  const codes: string[] = [];
  for (const [code, url] of result) {
    if (url === NotFound) codes.push(code);
  }
  return codes;
}

/** Number of codes that resolved to a URL */
export function matchedCount(result: MatchResult): number {
  let count = 0;
  for (const url of result.values()) {
    if (url !== NotFound) count++;
  }
  return count;
}

/**
 * Look up one code's match.
 * @param result - Output of matchProducts
 * @param code - Product code as given to matchProducts
 * @returns The URL, or NotFound when the code is unmatched or was never requested
 */
export function matchedUrl(result: MatchResult, code: string): string | NotFound {
  return result.get(code) ?? NotFound;
}
