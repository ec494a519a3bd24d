// Domain types for the CSV analysis pipeline

// ── Upload ────────────────────────────────────────────────────────────
export interface UploadedFile {
  filename: string;
  bytes: Uint8Array;
}

// ── Decoding ──────────────────────────────────────────────────────────
export interface DecodedText {
  text: string;
  encoding: string;
}

// ── Table ─────────────────────────────────────────────────────────────
/** `null` marks a missing value. */
export type Cell = number | string | null;

export interface Table {
  columns: string[];
  rows: Cell[][];
  /** Indexes into `columns`, in column order. */
  numericColumnIndexes: number[];
}

export type Delimiter = "," | ";";

export type {
  AnalysisResult,
  ColumnStatistics,
  ErrorResponse,
  HealthResponse,
  PreviewRow,
} from "@/lib/validators/schemas";
