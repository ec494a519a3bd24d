import type { PreviewRow } from "@/types";

export interface ChartPoint {
  /** 1-based preview row number. */
  idx: number;
  value: number;
}

/** Plottable values of one column across the preview rows; blanks and infinities are skipped. */
export function chartPoints(preview: PreviewRow[], column: string): ChartPoint[] {
  const points: ChartPoint[] = [];
  preview.forEach((row, i) => {
    const cell = row[column];
    const value = typeof cell === "number" ? cell : Number.NaN;
    if (Number.isFinite(value)) points.push({ idx: i + 1, value });
  });
  return points;
}
