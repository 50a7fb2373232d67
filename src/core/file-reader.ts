import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";

/** Written when the input file does not exist yet */
export const INPUT_TEMPLATE =
  "ProductCode\n# Add your product codes below, one per line\n";

const CODE_HEADER_NAMES = ["productcode", "product code", "code", "sku"];

export interface ReadCodesResult {
  codes: string[];
  /** True when the file was missing and a template was written instead */
  created: boolean;
}

/**
 * Read product codes from the first column of a CSV, text or XLSX file.
 * Blank lines, lines starting with "#" and a leading header are skipped.
 * A missing file is created from INPUT_TEMPLATE.
 */
export function readCodes(filePath: string): ReadCodesResult {
  if (!fs.existsSync(filePath)) {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(filePath, INPUT_TEMPLATE, "utf-8");
    return { codes: [], created: true };
  }

  const ext = path.extname(filePath).toLowerCase();
  const cells =
    ext === ".xlsx" || ext === ".xls"
      ? readXlsxFirstColumn(filePath)
      : parseCsvRecords(readText(filePath)).map((fields) => fields[0] ?? "");

  const codes: string[] = [];
  let sawHeader = false;
  for (const raw of cells) {
    const cell = raw.trim();
    if (!cell || cell.startsWith("#")) continue;
    const code = cell.split("#")[0].trim();
    if (!code) continue;
    if (!sawHeader && codes.length === 0 && CODE_HEADER_NAMES.includes(code.toLowerCase())) {
      sawHeader = true;
      continue;
    }
    codes.push(code);
  }
  return { codes, created: false };
}

/**
 * Codes already present in an output CSV (first column, header excluded).
 * @param filePath - Output CSV path
 * @returns The codes as written; empty when the file does not exist
 */
export function readWrittenCodes(filePath: string): Set<string> {
  const codes = new Set<string>();
  if (!fs.existsSync(filePath)) return codes;
  const records = parseCsvRecords(readText(filePath));
  for (const [i, fields] of records.entries()) {
    const code = (fields[0] ?? "").trim();
    if (i === 0 && code.toLowerCase() === "product code") continue;
    if (code) codes.add(code);
  }
  return codes;
}

// ── Internals ────────────────────────────────────────────────────────────────

function readText(filePath: string): string {
  const raw = fs.readFileSync(filePath, "utf-8");
  // Strip BOM if present
  return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
}

/**
 * CSV parser: quoted fields, "" escaped quotes, and newlines inside quotes.
 * Records with no content are dropped.
 */
export function parseCsvRecords(content: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;

  const endRecord = (): void => {
    fields.push(current);
    if (fields.some((f) => f.trim() !== "")) records.push(fields);
    fields = [];
    current = "";
  };

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else if (ch === "\n") {
      endRecord();
    } else if (ch !== "\r") {
      current += ch;
    }
  }
  if (current !== "" || fields.length > 0) endRecord();
  return records;
}

function readXlsxFirstColumn(filePath: string): string[] {
  const wb = XLSX.readFile(filePath);
  const sheetName = wb.SheetNames[0];
  if (!sheetName) return [];
  const ws = wb.Sheets[sheetName];

  // header:1 → array of arrays
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, {
    header: 1,
    raw: false,
    blankrows: false,
  });
  return rows.map((row) => String(row[0] ?? ""));
}
