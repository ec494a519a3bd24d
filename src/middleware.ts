import { NextResponse, type NextRequest } from "next/server";
import { appConfig } from "@/lib/config";
import { corsHeaders, isPreflightRequest, preflightResponse } from "@/lib/cors";

export function middleware(req: NextRequest) {
  const allowedOrigins = appConfig.corsAllowedOrigins;
  if (isPreflightRequest(req)) return preflightResponse(req, allowedOrigins);

  const res = NextResponse.next();
  for (const [name, value] of Object.entries(corsHeaders(req.headers.get("origin"), allowedOrigins))) {
    res.headers.set(name, value);
  }
  return res;
}

export const config = {
  matcher: ["/api/:path*", "/health"],
};
