import OpenAI from "openai";
import { TranslationError } from "../core/errors";
import { getErrorMessage } from "../core/http";
import { sleep } from "../core/utils";
import {
  convertPoundsToKilograms,
  insertAfterFirstLine,
  stripMarkdown,
} from "./text";

/** Structured product data sent alongside the English reference text */
export interface TranslationInput {
  code: string;
  name: string;
  raw_description: string;
  specifications: Record<string, string>;
  items_in_set: string[];
}

export interface Translator {
  /**
   * Produce the Spanish listing text for a product.
   * @throws TranslationError on service failure or an empty reply
   */
  translate(product: TranslationInput, englishText: string): Promise<string>;
}

export const SYSTEM_PROMPT =
  "You are a Spanish-speaking product content writer specializing in professional tools. " +
  "Your job is to create accurate, effective product descriptions that properly represent " +
  "each specific product's features and applications.";

/**
 * Convert every pound value in the product data before it reaches the model.
 */
function withKilograms(product: TranslationInput): TranslationInput {
  const specifications: Record<string, string> = {};
  for (const [key, value] of Object.entries(product.specifications)) {
    specifications[key] = convertPoundsToKilograms(value);
  }
  return {
    ...product,
    raw_description: convertPoundsToKilograms(product.raw_description),
    specifications,
    items_in_set: product.items_in_set.map(convertPoundsToKilograms),
  };
}

/**
 * User message for the text-generation service: the product as JSON and the
 * English reference text, both with weights already in kilograms, followed
 * by the listing guidelines.
 * @param product - Structured product data
 * @param englishText - Output of composeDescription
 */
export function buildTranslationPrompt(
  product: TranslationInput,
  englishText: string
): string {
  const productJson = JSON.stringify(withKilograms(product), null, 2);
  return `Create an effective Spanish product description for a Mercado Libre listing based on the following product information.
Focus on ACCURACY first - make sure you correctly describe this specific product's features and uses.

PRODUCT INFORMATION (JSON format):
${productJson}

ENGLISH DESCRIPTION (for reference):
${convertPoundsToKilograms(englishText)}

Guidelines:
1. START WITH THE PRODUCT NAME IN SPANISH. The original name is "${product.code} ${product.name}" - translate it and put it on the FIRST line.
2. Accurately describe THIS specific product - its exact features, specifications and intended uses.
3. Highlight the practical benefits of this product.
4. Include relevant application cases where this product would be used.
5. If it is a set, clearly list the items included.
6. Keep a professional marketing tone without exaggeration.
7. Keep technical measurements and specifications accurate.
8. OUTPUT MUST BE PLAIN TEXT (no markdown, HTML or other formatting).
9. IMPORTANT: express every weight in kilograms (kg), never pounds (lb). Convert with kg = lb x 0.453592 rounded to 2 decimals, e.g. "1.5 lb" becomes "0.68 kg".

Structure the description with:
- Clear section titles such as "Características:" and "Aplicaciones:"
- A dash at the start of every list item
- Plain text spacing for readability
- No markdown, HTML or special formatting characters such as #, * or backticks`;
}

export interface OpenAiTranslatorOptions {
  apiKey: string;
  model: string;
  /** Paragraph inserted after the title line of every description */
  listingNote?: string | null;
  /** Wait before the single retry after a rate-limit error */
  rateLimitDelayMs?: number;
}

function isRateLimited(err: unknown): boolean {
  if (typeof err === "object" && err !== null && "status" in err && err.status === 429) {
    return true;
  }
  return getErrorMessage(err).toLowerCase().includes("rate limit");
}

/**
 * Translator backed by the OpenAI chat completions API.
 */
export class OpenAiTranslator implements Translator {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiTranslatorOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
  }

  async translate(product: TranslationInput, englishText: string): Promise<string> {
    const prompt = buildTranslationPrompt(product, englishText);

    let reply: string;
    try {
      reply = await this.complete(prompt);
    } catch (err) {
      if (!isRateLimited(err)) {
        throw new TranslationError(
          `OpenAI API error: ${getErrorMessage(err)}`,
          product.code,
          { cause: err }
        );
      }
      const delay = this.options.rateLimitDelayMs ?? 20_000;
      console.warn(`     Rate limit hit, retrying once in ${delay / 1000}s...`);
      await sleep(delay);
      try {
        reply = await this.complete(prompt);
      } catch (retryErr) {
        throw new TranslationError(
          `OpenAI API error after retry: ${getErrorMessage(retryErr)}`,
          product.code,
          { cause: retryErr }
        );
      }
    }

    const text = convertPoundsToKilograms(stripMarkdown(reply));
    if (!text) {
      throw new TranslationError("Empty translation returned", product.code);
    }
    return this.options.listingNote
      ? insertAfterFirstLine(text, this.options.listingNote)
      : text;
  }

  private async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      temperature: 0.5,
      max_tokens: 1500,
    });
    return response.choices[0]?.message?.content?.trim() ?? "";
  }
}
