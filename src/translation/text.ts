export const KG_PER_LB = 0.453592;

/**
 * Amount then pound unit. The amount is a mixed fraction ("1-1/2", "2 1/2"),
 * a fraction ("1/2"), a thousands-grouped number ("1,250") or a decimal with
 * dot or comma ("1.5", "1,5"). The unit may be hyphenated to the amount
 * ("1.5-lb"). Torque units (lb-in, lb-ft) are not weights and are left alone.
 */
const POUND_PATTERN =
  /(?<![\d.,/])(\d+[ -]\d+\/\d+|\d+\/\d+|\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:[.,]\d+)?)[\s-]*(?:lbs|lb|pounds|pound|libras|libra)\b(?!-(?:in|ft)\b)/gi;

const MIXED_FRACTION = /^(\d+)[ -](\d+)\/(\d+)$/;
const FRACTION = /^(\d+)\/(\d+)$/;
const THOUSANDS = /^\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;

function parseAmount(raw: string): number {
  const mixed = MIXED_FRACTION.exec(raw);
  if (mixed) return Number(mixed[1]) + Number(mixed[2]) / Number(mixed[3]);
  const fraction = FRACTION.exec(raw);
  if (fraction) return Number(fraction[1]) / Number(fraction[2]);
  if (THOUSANDS.test(raw)) return parseFloat(raw.replace(/,/g, ""));
  return parseFloat(raw.replace(",", "."));
}

/**
 * kg = lb × 0.453592, rounded to two decimals.
 * @param lb - Weight in pounds
 * @returns Kilograms with exactly two decimals, e.g. "0.68"
 */
export function poundsToKilograms(lb: number): string {
  return (Math.round(lb * KG_PER_LB * 100) / 100).toFixed(2);
}

/**
 * Rewrite every pound weight in the text as kilograms, e.g. "1.5 lb" → "0.68 kg".
 */
export function convertPoundsToKilograms(text: string): string {
  return text.replace(POUND_PATTERN, (match, amount: string) => {
    const lb = parseAmount(amount);
    if (!Number.isFinite(lb)) return match;
    return `${poundsToKilograms(lb)} kg`;
  });
}

/**
 * Remove markdown the model may emit despite being asked for plain text:
 * headings, emphasis, links, code spans and bullet stars.
 */
export function stripMarkdown(text: string): string {
  return text
    .replace(/^#{1,6}\s*/gm, "")
    .replace(/\[([^\]]+)\]\([^)]*\)/g, "$1")
    .replace(/\*\*(.+?)\*\*/g, "$1")
    .replace(/__(.+?)__/g, "$1")
    .replace(/^[ \t]*[*+][ \t]+/gm, "- ")
    .replace(/\*(.+?)\*/g, "$1")
    .replace(/(^|\W)_(.+?)_(?=\W|$)/gm, "$1$2")
    .replace(/```[a-z]*\n?/gi, "")
    .replace(/[`*#]/g, "")
    .trim();
}

/**
 * Insert a paragraph right after the first line (the product title).
 * @param text - Spanish description
 * @param paragraph - Listing note to insert
 * @returns Title, note and the rest of the text separated by blank lines
 */
export function insertAfterFirstLine(text: string, paragraph: string): string {
  const newline = text.indexOf("\n");
  if (newline === -1) return `${text}\n\n${paragraph}`;
  const title = text.slice(0, newline);
  const rest = text.slice(newline + 1).replace(/^\s+/, "");
  return `${title}\n\n${paragraph}\n\n${rest}`;
}
