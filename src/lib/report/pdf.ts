import { jsPDF } from "jspdf";
import autoTable from "jspdf-autotable";
import { formatCell, formatNumber, truncate } from "@/lib/format";
import type { AnalysisResult } from "@/types";

export const REPORT_PREVIEW_COLUMNS = 6;
export const REPORT_CELL_LENGTH = 28;

const MARGIN = 40;
const PRIMARY: [number, number, number] = [79, 70, 229];
const MUTED: [number, number, number] = [107, 107, 118];

export type ReportLabelKey =
  | "pdfTitle"
  | "fileShort"
  | "rowsShort"
  | "colsShort"
  | "numericShort"
  | "statsTitlePdf"
  | "previewTitlePdf"
  | "noNumericCols"
  | "noPreview"
  | "col"
  | "count"
  | "min"
  | "max"
  | "mean"
  | "sum"
  | "page"
  | "of";

export type Translate = (key: ReportLabelKey) => string;

export function reportFilename(language: string): string {
  return `csv-insight-report-${language}.pdf`;
}

export function pageFooter(translate: Translate, page: number, pages: number): string {
  return `${translate("page")} ${page} ${translate("of")} ${pages}`;
}

export function statsBody(result: AnalysisResult, locale: string): string[][] {
  return result.numericColumns.map((column) => {
    const s = result.stats[column];
    return [
      column,
      s ? String(s.count) : "-",
      formatNumber(s?.min, locale),
      formatNumber(s?.max, locale),
      formatNumber(s?.mean, locale),
      formatNumber(s?.sum, locale),
    ];
  });
}

/** The first few preview columns, cells cut to fit the page width. */
export function previewTable(result: AnalysisResult): { head: string[]; body: string[][] } {
  const head = Object.keys(result.preview[0] ?? {}).slice(0, REPORT_PREVIEW_COLUMNS);
  const body = result.preview.map((row) =>
    head.map((column) => truncate(formatCell(row[column]), REPORT_CELL_LENGTH))
  );
  return { head, body };
}

export function buildReportPdf(result: AnalysisResult, translate: Translate, locale: string): jsPDF {
  const doc = new jsPDF({ unit: "pt", format: "a4" });
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  let cursorY = MARGIN;

  doc.setFontSize(18);
  doc.setTextColor(...PRIMARY);
  doc.text(translate("pdfTitle"), MARGIN, cursorY + 8);
  cursorY += 30;

  doc.setFontSize(10);
  doc.setTextColor(...MUTED);
  doc.text(
    `${translate("fileShort")}: ${result.filename}  |  ${translate("rowsShort")}: ${result.rows}  |  ${translate("colsShort")}: ${result.cols}`,
    MARGIN,
    cursorY
  );
  cursorY += 20;

  // Summary cards
  const cards: Array<[string, string]> = [
    [translate("fileShort"), truncate(result.filename, 18)],
    [translate("rowsShort"), formatNumber(result.rows, locale)],
    [translate("colsShort"), formatNumber(result.cols, locale)],
    [translate("numericShort"), String(result.numericColumns.length)],
  ];
  const gap = 10;
  const cardWidth = (pageWidth - MARGIN * 2 - gap * (cards.length - 1)) / cards.length;
  cards.forEach(([label, value], i) => {
    const x = MARGIN + i * (cardWidth + gap);
    doc.setDrawColor(226, 226, 230);
    doc.setFillColor(247, 247, 248);
    doc.roundedRect(x, cursorY, cardWidth, 48, 6, 6, "FD");
    doc.setFontSize(8);
    doc.setTextColor(...MUTED);
    doc.text(label, x + 8, cursorY + 16);
    doc.setFontSize(13);
    doc.setTextColor(23, 23, 28);
    doc.text(value, x + 8, cursorY + 36);
  });
  cursorY += 72;

  const trackCursor = (data: { cursor: { y: number } | null }) => {
    cursorY = data.cursor?.y ?? cursorY;
  };

  doc.setFontSize(12);
  doc.setTextColor(...PRIMARY);
  doc.text(translate("statsTitlePdf"), MARGIN, cursorY);
  cursorY += 8;
  const stats = statsBody(result, locale);
  if (stats.length === 0) {
    doc.setFontSize(10);
    doc.setTextColor(...MUTED);
    doc.text(translate("noNumericCols"), MARGIN, cursorY + 14);
    cursorY += 20;
  } else {
    autoTable(doc, {
      startY: cursorY,
      margin: { left: MARGIN, right: MARGIN },
      head: [[translate("col"), translate("count"), translate("min"), translate("max"), translate("mean"), translate("sum")]],
      body: stats,
      styles: { fontSize: 9 },
      headStyles: { fillColor: PRIMARY },
      didDrawPage: trackCursor,
    });
  }
  cursorY += 28;

  doc.setFontSize(12);
  doc.setTextColor(...PRIMARY);
  doc.text(translate("previewTitlePdf"), MARGIN, cursorY);
  cursorY += 8;
  const preview = previewTable(result);
  if (preview.head.length === 0) {
    doc.setFontSize(10);
    doc.setTextColor(...MUTED);
    doc.text(translate("noPreview"), MARGIN, cursorY + 14);
  } else {
    autoTable(doc, {
      startY: cursorY,
      margin: { left: MARGIN, right: MARGIN },
      head: [preview.head],
      body: preview.body,
      styles: { fontSize: 8, overflow: "ellipsize" },
      headStyles: { fillColor: PRIMARY },
      didDrawPage: trackCursor,
    });
  }

  const pages = doc.getNumberOfPages();
  for (let page = 1; page <= pages; page++) {
    doc.setPage(page);
    doc.setFontSize(9);
    doc.setTextColor(...MUTED);
    doc.text(pageFooter(translate, page, pages), pageWidth - MARGIN, pageHeight - 20, { align: "right" });
  }

  return doc;
}
