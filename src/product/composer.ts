import { ProductRecord } from "./types";

/** Specification rows that identify the product rather than describe it */
const NON_FEATURE_KEYS = new Set(["product code", "sku", "upc", "ean", "gtin"]);

const GENERIC_FEATURES = [
  "- Professional-grade construction",
  "- Ergonomic design for comfortable use",
  "- Made from high-quality materials for durability",
];

export interface ComposeOptions {
  brand?: string | null;
}

/**
 * Build the English reference description from scraped fields.
 * Sections: title, overview, features, set contents (only for kits),
 * typical applications, additional information. Pure and deterministic.
 */
export function composeDescription(
  product: ProductRecord,
  options: ComposeOptions = {}
): string {
  const brand = options.brand?.trim() || "";
  const label = [brand, product.code].filter(Boolean).join(" ");

  const title = `${label} - ${product.name}`;

  let overview = `The ${label} ${product.name} is a quality product built for professional use and demanding applications.`;
  if (product.description) overview += ` ${product.description}`;

  const features = ["Features:"];
  for (const [key, value] of Object.entries(product.specs)) {
    if (!NON_FEATURE_KEYS.has(key.toLowerCase())) {
      features.push(`- ${key}: ${value}`);
    }
  }
  if (features.length === 1) features.push(...GENERIC_FEATURES);

  const sections = [title, overview, features.join("\n")];

  if (product.setItems.length > 0) {
    sections.push(
      ["This set includes:", ...product.setItems.map((item) => `- ${item}`)].join("\n")
    );
  }

  const applications =
    product.applications.length > 0
      ? product.applications.map((app) => `- ${app}`)
      : [`- General professional use of the ${product.name}`];
  sections.push(["Typical Applications:", ...applications].join("\n"));

  const info = ["Additional Information:"];
  if (brand) info.push(`- Brand: ${brand}`);
  info.push(`- Model: ${product.code}`);
  sections.push(info.join("\n"));

  return sections.join("\n\n");
}
