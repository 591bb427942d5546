import type { MiddlewareHandler } from "hono";

export function cors(allowedOrigin: string): MiddlewareHandler {
  return async (c, next) => {
    const origin = c.req.header("Origin") || "";
    if (origin && origin === allowedOrigin) {
      c.header("Access-Control-Allow-Origin", origin);
      c.header("Vary", "Origin");
      c.header("Access-Control-Allow-Headers", "content-type, x-request-id");
      c.header("Access-Control-Allow-Methods", "GET, POST, PUT, OPTIONS");
      c.header("Access-Control-Expose-Headers", "x-request-id");
    }

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204);
    }

    await next();
  };
}
