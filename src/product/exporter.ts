import * as fs from "fs";
import * as path from "path";
import { OutputRow } from "./types";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

export const OUTPUT_HEADERS = [
  "Product Code",
  "Product Name",
  "Image URL",
  "Product URL",
  "Spanish Description",
];

/**
 * Escape a value for a CSV cell. The value is wrapped in double quotes,
 * with inner quotes doubled, when it holds a comma, quote or line break.
 * @param value - Cell content; null and undefined become an empty cell
 * @returns The cell text
 */
export function escapeCsv(value: string | number | null | undefined): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function endsWithNewline(filePath: string, size: number): boolean {
  const fd = fs.openSync(filePath, "r");
  try {
    const buf = Buffer.alloc(1);
    fs.readSync(fd, buf, 0, 1, size - 1);
    return buf[0] === 0x0a;
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Append one row to the output CSV. A new (or empty) file gets the BOM and
 * header first; existing rows are never rewritten.
 * @param filePath - Output CSV path; missing directories are created
 * @param row - The product's output fields
 */
export function appendRow(filePath: string, row: OutputRow): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  const size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;

  let chunk = "";
  if (size === 0) {
    chunk += BOM + OUTPUT_HEADERS.map(escapeCsv).join(",") + "\n";
  } else if (!endsWithNewline(filePath, size)) {
    chunk += "\n";
  }
  chunk +=
    [row.code, row.name, row.imageUrl, row.url, row.spanishDescription]
      .map(escapeCsv)
      .join(",") + "\n";

  fs.appendFileSync(filePath, chunk, "utf-8");
}

/**
 * Fail early when the output file could not be appended to. Nothing is
 * created: a missing file is checked through its closest existing directory.
 * @param filePath - Output CSV path
 * @throws the fs error (EACCES, EROFS, ...) when writing is not permitted
 */
export function assertWritable(filePath: string): void {
  const target = path.resolve(filePath);
  if (fs.existsSync(target)) {
    fs.accessSync(target, fs.constants.W_OK);
    return;
  }
  let dir = path.dirname(target);
  while (!fs.existsSync(dir) && path.dirname(dir) !== dir) {
    dir = path.dirname(dir);
  }
  fs.accessSync(dir, fs.constants.W_OK);
}
