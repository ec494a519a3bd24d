import Papa from "papaparse";
import { AnalyzeError } from "@/lib/errors";
import type { Cell, Delimiter, Table } from "@/types";

// Cells equal to one of these (untrimmed) are missing values.
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
]);

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)(?:inf|infinity)$/i;

export function isMissing(raw: string): boolean {
  return MISSING_VALUE_TOKENS.has(raw);
}

/** Parses a cell as a number; returns null when it is not numeric. */
export function parseNumber(raw: string): number | null {
  const text = raw.trim();
  if (DECIMAL_PATTERN.test(text)) return Number(text);
  const inf = INFINITY_PATTERN.exec(text);
  if (inf) return inf[1] === "-" ? -Infinity : Infinity;
  return null;
}

/** Blank header names become `Unnamed: <index>`; repeats get `.1`, `.2`, ... */
export function normalizeColumnNames(header: string[]): string[] {
  const used = new Set<string>();
  const suffixes = new Map<string, number>();
  return header.map((raw, index) => {
    const name = raw === "" ? `Unnamed: ${index}` : raw;
    let candidate = name;
    let suffix = suffixes.get(name) ?? 0;
    while (used.has(candidate)) {
      suffix += 1;
      candidate = `${name}.${suffix}`;
    }
    suffixes.set(name, suffix);
    used.add(candidate);
    return candidate;
  });
}

interface CsvRecord {
  fields: string[];
  /** 1-based physical line the record starts on. */
  line: number;
}

function isBlankRecord(fields: string[]): boolean {
  return fields.length === 1 && (fields[0] ?? "").trim() === "";
}

function countLineBreaks(fields: string[]): number {
  return fields.reduce((total, field) => total + (field.match(/\r\n|\r|\n/g)?.length ?? 0), 0);
}

function readRecords(text: string, delimiter: Delimiter): CsvRecord[] {
  const parsed = Papa.parse<string[]>(text, { delimiter });
  const firstError = parsed.errors[0];
  if (firstError) {
    const where = typeof firstError.row === "number" ? ` (row ${firstError.row + 1})` : "";
    throw new AnalyzeError("parse_failure", `${firstError.message}${where}`);
  }

  // Blank lines come back as [""]; they are dropped but still advance the line count.
  const records: CsvRecord[] = [];
  let line = 1;
  for (const fields of parsed.data) {
    if (!isBlankRecord(fields)) records.push({ fields, line });
    line += 1 + countLineBreaks(fields);
  }
  return records;
}

/**
 * A column is numeric when there is at least one data row and every
 * non-missing cell parses as a number. All-missing columns count as numeric.
 */
function isNumericColumn(rawRows: Array<Array<string | null>>, index: number): boolean {
  if (rawRows.length === 0) return false;
  return rawRows.every((row) => {
    const raw = row[index] ?? null;
    return raw === null || parseNumber(raw) !== null;
  });
}

export function parseTable(text: string, delimiter: Delimiter): Table {
  const records = readRecords(text, delimiter);
  const [header, ...body] = records;
  if (!header) {
    throw new AnalyzeError("parse_failure", "No columns to parse from file");
  }

  const columns = normalizeColumnNames(header.fields);
  const width = columns.length;

  const rawRows = body.map(({ fields, line }) => {
    if (fields.length > width) {
      throw new AnalyzeError(
        "parse_failure",
        `Expected ${width} fields in line ${line}, saw ${fields.length}`
      );
    }
    const row: Array<string | null> = [];
    for (let c = 0; c < width; c++) {
      const raw = fields[c];
      row.push(raw === undefined || isMissing(raw) ? null : raw);
    }
    return row;
  });

  const numericColumnIndexes = columns
    .map((_, index) => index)
    .filter((index) => isNumericColumn(rawRows, index));
  const numeric = new Set(numericColumnIndexes);

  const rows: Cell[][] = rawRows.map((row) =>
    row.map((raw, index) => {
      if (raw === null) return null;
      return numeric.has(index) ? parseNumber(raw) : raw;
    })
  );

  return { columns, rows, numericColumnIndexes };
}
