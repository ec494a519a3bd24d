import type { HealthResponse } from "@/types";

export function GET() {
  return Response.json({ status: "ok" } satisfies HealthResponse);
}
