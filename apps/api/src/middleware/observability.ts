import type { Context, MiddlewareHandler } from "hono";
import { routePath } from "hono/route";
import type { AppEnv } from "../env";

function getOrCreateRequestId(c: Context<AppEnv>) {
  const incoming = c.req.header("x-request-id") || c.req.header("x-requestid");
  return incoming || crypto.randomUUID();
}

export const observabilityMiddleware: MiddlewareHandler<AppEnv> = async (c, next) => {
  const requestId = getOrCreateRequestId(c);
  c.set("request_id", requestId);

  const start = Date.now();

  try {
    await next();
  } finally {
    const latencyMs = Date.now() - start;
    const status = c.res?.status ?? 500;

    c.header("x-request-id", requestId);

    const route = routePath(c) || c.req.path;

    console.log(
      JSON.stringify({
        level: "info",
        ts: new Date().toISOString(),
        request_id: requestId,
        method: c.req.method,
        route,
        status,
        latency_ms: latencyMs
      })
    );
  }
};
