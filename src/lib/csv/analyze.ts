import { AnalyzeError, isAnalyzeError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { analysisResultSchema } from "@/lib/validators/schemas";
import type { AnalysisResult, Delimiter, Table, UploadedFile } from "@/types";
import { DEFAULT_DECODERS, decodeText, type CandidateDecoder } from "./decode";
import { parseTable } from "./parse";
import { buildPreview, PREVIEW_ROW_LIMIT } from "./preview";
import { characterCountSniffer, type DelimiterSniffer } from "./sniff";
import { computeStatistics } from "./stats";

export interface AnalyzeOptions {
  decoders?: readonly CandidateDecoder[];
  sniffer?: DelimiterSniffer;
  previewRows?: number;
}

export function validateUpload(upload: UploadedFile): void {
  if (!upload.filename.endsWith(".csv")) {
    throw new AnalyzeError("unsupported_file_type", "Only .csv files are accepted");
  }
  if (upload.bytes.byteLength === 0) {
    throw new AnalyzeError("empty_file", "The uploaded file is empty");
  }
}

function readTable(text: string, delimiter: Delimiter): Table {
  try {
    return parseTable(text, delimiter);
  } catch (err) {
    if (isAnalyzeError(err)) {
      throw new AnalyzeError(err.kind, `Failed to read CSV: ${err.message}`);
    }
    throw err;
  }
}

/** decode → sniff → parse → aggregate → shape */
export function analyzeUpload(upload: UploadedFile, options: AnalyzeOptions = {}): AnalysisResult {
  validateUpload(upload);

  const decoded = decodeText(upload.bytes, options.decoders ?? DEFAULT_DECODERS);
  const delimiter = (options.sniffer ?? characterCountSniffer).sniff(decoded.text);

  const table = readTable(decoded.text, delimiter);

  logger.debug("analyze", {
    filename: upload.filename,
    encoding: decoded.encoding,
    delimiter,
    rows: table.rows.length,
    cols: table.columns.length,
  });

  return analysisResultSchema.parse({
    filename: upload.filename,
    rows: table.rows.length,
    cols: table.columns.length,
    numericColumns: table.numericColumnIndexes.map((index) => table.columns[index]),
    stats: computeStatistics(table),
    preview: buildPreview(table, options.previewRows ?? PREVIEW_ROW_LIMIT),
  });
}
