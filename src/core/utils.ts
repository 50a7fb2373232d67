/**
 * Resolve after a delay.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Drop repeated values, comparing case-insensitively. The first spelling
 * of each value is kept, in input order.
 * @param values - Product codes as read from the input file
 * @returns The distinct values
 */
export function deduplicate(values: string[]): string[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = value.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Render an elapsed time for the run summary: "45s", or "2m 30s" past the
 * first minute.
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

/** Collapse runs of whitespace and trim */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
