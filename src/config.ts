import { z } from "zod";
import { ConfigError } from "./core/errors";
import { AppConfig } from "./types";

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

/** Empty strings count as unset */
const blankToUndefined = (v: unknown): unknown =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const flag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) return fallback;
        const normalized = value.trim().toLowerCase();
        if (TRUE_VALUES.includes(normalized)) return true;
        if (FALSE_VALUES.includes(normalized)) return false;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected true or false, got "${value}"`,
        });
        return z.NEVER;
      })
  );

const integer = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const text = z.preprocess(blankToUndefined, z.string().trim().optional());

const pattern = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return null;
      try {
        return new RegExp(value);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid regular expression "${value}"`,
        });
        return z.NEVER;
      }
    })
);

const envSchema = z.object({
  SITEMAP_URL: z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: "SITEMAP_URL is required" })
      .trim()
      .url("SITEMAP_URL must be an absolute URL")
      .refine((url) => /^https?:\/\//i.test(url), "SITEMAP_URL must use http or https")
  ),
  INPUT_CSV: z.preprocess(blankToUndefined, z.string().default("codes.csv")),
  OUTPUT_CSV: z.preprocess(blankToUndefined, z.string().default("products.csv")),
  RECURSIVE: flag(true),
  MAX_PRODUCTS: integer(0, 0),
  DEBUG: flag(false),
  FORCE_MODE: flag(false),
  OPENAI_API_KEY: text,
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o")),
  SITEMAP_FILTER: pattern,
  URL_FILTER: pattern,
  BRAND: text,
  LISTING_NOTE: text,
  DEDUPLICATE_CODES: flag(true),
  SKIP_EXISTING: flag(false),
  REQUEST_TIMEOUT_MS: integer(30_000, 1),
  REQUEST_DELAY_MS: integer(1_000, 0),
  HTTP_RETRIES: integer(0, 0),
});

/**
 * Build the run configuration from environment variables.
 * @throws ConfigError naming the first invalid or missing setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = String(issue.path[0] ?? "environment");
    const message = issue.message.startsWith(key)
      ? issue.message
      : `${key}: ${issue.message}`;
    throw new ConfigError(`Invalid configuration - ${message}`, key);
  }

  const e = parsed.data;
  return {
    sitemapUrl: e.SITEMAP_URL,
    inputCsv: e.INPUT_CSV,
    outputCsv: e.OUTPUT_CSV,
    recursive: e.RECURSIVE,
    maxProducts: e.MAX_PRODUCTS,
    debug: e.DEBUG,
    forceMode: e.FORCE_MODE,
    openaiApiKey: e.OPENAI_API_KEY ?? null,
    openaiModel: e.OPENAI_MODEL,
    sitemapFilter: e.SITEMAP_FILTER,
    urlFilter: e.URL_FILTER,
    brand: e.BRAND ?? null,
    listingNote: e.LISTING_NOTE ?? null,
    deduplicateCodes: e.DEDUPLICATE_CODES,
    skipExisting: e.SKIP_EXISTING,
    timeout: e.REQUEST_TIMEOUT_MS,
    delayMs: e.REQUEST_DELAY_MS,
    retries: e.HTTP_RETRIES,
  };
}
