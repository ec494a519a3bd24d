import { z } from "zod";

// z.record rebuilds the object and loses a "__proto__" key; column names come
// straight from the CSV header, so validate in place and keep every own key.
function columnRecord<T extends z.ZodTypeAny>(value: T) {
  return z.custom<Record<string, z.infer<T>>>(
    (input) =>
      typeof input === "object" &&
      input !== null &&
      !Array.isArray(input) &&
      Object.values(input).every((entry) => value.safeParse(entry).success),
    { message: "Expected an object keyed by column name" }
  );
}

// ── Statistics ────────────────────────────────────────────────────────
export const columnStatisticsSchema = z.object({
  count: z.number().int().nonnegative(),
  min: z.number().finite().nullable(),
  max: z.number().finite().nullable(),
  mean: z.number().finite().nullable(),
  sum: z.number().finite().nullable(),
});
export type ColumnStatistics = z.infer<typeof columnStatisticsSchema>;

// ── Preview ───────────────────────────────────────────────────────────
export const previewCellSchema = z.union([z.string(), z.number().finite()]);
export const previewRowSchema = columnRecord(previewCellSchema);
export type PreviewRow = z.infer<typeof previewRowSchema>;

// ── Analysis response ─────────────────────────────────────────────────
export const analysisResultSchema = z.object({
  filename: z.string(),
  rows: z.number().int().nonnegative(),
  cols: z.number().int().nonnegative(),
  numericColumns: z.array(z.string()),
  stats: columnRecord(columnStatisticsSchema),
  preview: z.array(previewRowSchema),
});
export type AnalysisResult = z.infer<typeof analysisResultSchema>;

// ── Errors ────────────────────────────────────────────────────────────
export const errorResponseSchema = z.object({
  detail: z.string(),
});
export type ErrorResponse = z.infer<typeof errorResponseSchema>;

// ── Health ────────────────────────────────────────────────────────────
export const healthResponseSchema = z.object({
  status: z.literal("ok"),
});
export type HealthResponse = z.infer<typeof healthResponseSchema>;
