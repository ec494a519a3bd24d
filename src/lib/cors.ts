export const CORS_ALLOWED_METHODS = "DELETE, GET, HEAD, OPTIONS, PATCH, POST, PUT";
export const CORS_MAX_AGE_SECONDS = 600;

export function isOriginAllowed(
  origin: string | null,
  allowedOrigins: readonly string[]
): origin is string {
  return origin !== null && allowedOrigins.includes(origin);
}

export function isPreflightRequest(req: Request): boolean {
  return (
    req.method === "OPTIONS" &&
    req.headers.has("origin") &&
    req.headers.has("access-control-request-method")
  );
}

/** Headers added to a non-preflight response; empty when the origin is not allowed. */
export function corsHeaders(origin: string | null, allowedOrigins: readonly string[]): Record<string, string> {
  if (!isOriginAllowed(origin, allowedOrigins)) return {};
  return {
    "Access-Control-Allow-Origin": origin,
    Vary: "Origin",
  };
}

export function preflightResponse(req: Request, allowedOrigins: readonly string[]): Response {
  const origin = req.headers.get("origin");
  if (!isOriginAllowed(origin, allowedOrigins)) {
    return new Response("Disallowed CORS origin", {
      status: 400,
      headers: { "Content-Type": "text/plain; charset=utf-8", Vary: "Origin" },
    });
  }

  const headers = new Headers({
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Methods": CORS_ALLOWED_METHODS,
    "Access-Control-Max-Age": String(CORS_MAX_AGE_SECONDS),
    "Content-Type": "text/plain; charset=utf-8",
    Vary: "Origin",
  });
  const requestedHeaders = req.headers.get("access-control-request-headers");
  if (requestedHeaders) headers.set("Access-Control-Allow-Headers", requestedHeaders);

  return new Response("OK", { status: 200, headers });
}
