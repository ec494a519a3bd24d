import { isAnalyzeError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { ErrorResponse } from "@/types";

export function detailResponse(detail: string, status: number): Response {
  return Response.json({ detail } satisfies ErrorResponse, { status });
}

/** Maps a thrown value to `{ detail }`; anything unexpected becomes a bare 500. */
export function errorResponse(err: unknown, context: string): Response {
  if (isAnalyzeError(err)) {
    logger.info(`${context} rejected`, { kind: err.kind, detail: err.message });
    return detailResponse(err.message, err.statusCode);
  }
  logger.error(`${context} failed:`, err);
  return detailResponse("Internal server error", 500);
}
