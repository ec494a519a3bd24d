import type { z } from "zod";
import {
  analysisResultSchema,
  errorResponseSchema,
  healthResponseSchema,
} from "@/lib/validators/schemas";
import type { AnalysisResult, HealthResponse } from "@/types";

const API_BASE_URL = (process.env.NEXT_PUBLIC_API_BASE_URL ?? "").replace(/\/$/, "");
const ANALYZE_TIMEOUT = 60_000;
const HEALTH_TIMEOUT = 2_000;

export class ApiError extends Error {
  statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
  }
}

async function readErrorDetail(res: Response): Promise<string> {
  const body: unknown = await res.json().catch(() => null);
  const parsed = errorResponseSchema.safeParse(body);
  if (parsed.success && parsed.data.detail.trim() !== "") return parsed.data.detail;
  return `Request failed (${res.status})`;
}

async function request<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init: RequestInit & { timeoutMs: number }
): Promise<T> {
  const { timeoutMs, ...rest } = init;
  const res = await fetch(`${API_BASE_URL}${path}`, {
    ...rest,
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!res.ok) throw new ApiError(res.status, await readErrorDetail(res));
  return schema.parse(await res.json());
}

export const csvInsightClient = {
  /** Upload a CSV and get its row/column counts, numeric stats and preview. */
  async analyze(file: File): Promise<AnalysisResult> {
    const formData = new FormData();
    formData.append("file", file);
    return request("/api/analyze", analysisResultSchema, {
      method: "POST",
      body: formData,
      timeoutMs: ANALYZE_TIMEOUT,
    });
  },

  async healthCheck(): Promise<HealthResponse> {
    return request("/health", healthResponseSchema, { timeoutMs: HEALTH_TIMEOUT });
  },
};
