import type { Cell, PreviewRow, Table } from "@/types";

export const PREVIEW_ROW_LIMIT = 20;

/** Missing → `""`; infinities become `"inf"` / `"-inf"` since JSON has no literal for them. */
export function previewCell(cell: Cell | undefined): string | number {
  if (cell === null || cell === undefined) return "";
  if (typeof cell === "number" && !Number.isFinite(cell)) return cell > 0 ? "inf" : "-inf";
  return cell;
}

export function buildPreview(table: Table, limit = PREVIEW_ROW_LIMIT): PreviewRow[] {
  return table.rows
    .slice(0, limit)
    .map((row) =>
      Object.fromEntries(
        table.columns.map((column, index): [string, string | number] => [column, previewCell(row[index])])
      )
    );
}
