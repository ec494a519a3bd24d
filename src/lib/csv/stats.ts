import type { ColumnStatistics, Table } from "@/types";

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

/** count/min/max/mean/sum over the non-missing cells of one column. */
export function summarizeColumn(values: Iterable<number | null>): ColumnStatistics {
  let count = 0;
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value === null || Number.isNaN(value)) continue;
    count++;
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  if (count === 0) {
    return { count, min: null, max: null, mean: null, sum: 0 };
  }
  return {
    count,
    min: finiteOrNull(min),
    max: finiteOrNull(max),
    mean: finiteOrNull(sum / count),
    sum: finiteOrNull(sum),
  };
}

function* numericCells(table: Table, index: number): Generator<number | null> {
  for (const row of table.rows) {
    const cell = row[index] ?? null;
    yield typeof cell === "number" ? cell : null;
  }
}

export function computeStatistics(table: Table): Record<string, ColumnStatistics> {
  return Object.fromEntries(
    table.numericColumnIndexes.map((index): [string, ColumnStatistics] => [
      table.columns[index] ?? String(index),
      summarizeColumn(numericCells(table, index)),
    ])
  );
}
