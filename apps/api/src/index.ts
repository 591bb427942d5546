import {
  OptimizeRequestSchema,
  PackSizesUpdateRequestSchema,
  type ErrorCode,
  type HealthResponse,
  type PackSizesResponse
} from "@packwise/shared";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono, type Context } from "hono";
import { relative, resolve } from "node:path";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { AppConfig, AppEnv } from "./env";
import { PackingError } from "./lib/errors";
import { cors } from "./middleware/cors";
import { observabilityMiddleware } from "./middleware/observability";
import { securityHeaders } from "./middleware/security";
import { optimize } from "./services/optimizer";
import type { PackSizeRegistry } from "./services/packSizes";

type AppContext = Context<AppEnv>;

export type AppDeps = {
  registry: PackSizeRegistry;
  config: Pick<AppConfig, "allowedOrigin" | "maxTableEntries" | "staticDir">;
};

function buildErrorPayload(c: AppContext, code: ErrorCode, message?: string, details?: unknown) {
  const error: Record<string, unknown> = {
    code,
    message: message ?? code,
    request_id: c.get("request_id")
  };

  if (details !== undefined) {
    error.details = details;
  }

  return { error };
}

function respondError(c: AppContext, code: ErrorCode, status: ContentfulStatusCode, message?: string, details?: unknown) {
  return c.json(buildErrorPayload(c, code, message, details), status);
}

function methodNotAllowed(allow: string) {
  return (c: AppContext) => {
    c.header("Allow", allow);
    return respondError(c, "METHOD_NOT_ALLOWED", 405, "method not allowed");
  };
}

type JsonBody = { ok: true; value: unknown } | { ok: false };

async function readJson(c: AppContext): Promise<JsonBody> {
  try {
    return { ok: true, value: await c.req.json<unknown>() };
  } catch {
    return { ok: false };
  }
}

function respondFailure(c: AppContext, route: string, err: unknown, fallbackMessage: string) {
  if (err instanceof PackingError) {
    return respondError(c, err.code, 400, err.message);
  }

  console.log(
    JSON.stringify({
      level: "error",
      ts: new Date().toISOString(),
      route,
      request_id: c.get("request_id"),
      message: fallbackMessage,
      err: err instanceof Error ? `${err.name}: ${err.message}` : String(err)
    })
  );

  return respondError(c, "INTERNAL_ERROR", 500, fallbackMessage);
}

export function createApp(deps: AppDeps) {
  const { registry, config } = deps;
  const app = new Hono<AppEnv>();

  app.use("*", observabilityMiddleware);
  app.use("*", securityHeaders());
  app.use("*", cors(config.allowedOrigin));

  app.get("/api/health", (c) => c.json({ status: "ok" } satisfies HealthResponse));
  app.all("/api/health", methodNotAllowed("GET"));

  app.post("/api/optimize", async (c) => {
    const body = await readJson(c);
    if (!body.ok) {
      return respondError(c, "INVALID_JSON", 400, "Request body must be a single JSON object");
    }

    const parsed = OptimizeRequestSchema.safeParse(body.value);
    if (!parsed.success) {
      return respondError(c, "INVALID_INPUT", 400, "Invalid optimize payload", parsed.error.flatten());
    }

    try {
      const packSizes = registry.get();
      const plan = optimize(parsed.data.items_ordered, packSizes, { maxTableEntries: config.maxTableEntries });

      console.log(
        JSON.stringify({
          level: "info",
          ts: new Date().toISOString(),
          route: "/api/optimize",
          request_id: c.get("request_id"),
          items_ordered: plan.items_ordered,
          total_items: plan.total_items,
          total_packs: plan.total_packs,
          pack_size_count: packSizes.length
        })
      );

      return c.json(plan);
    } catch (err) {
      return respondFailure(c, "/api/optimize", err, "unable to optimize pack breakdown");
    }
  });
  app.all("/api/optimize", methodNotAllowed("POST"));

  app.get("/api/pack-sizes", (c) => c.json({ pack_sizes: [...registry.get()] } satisfies PackSizesResponse));

  app.put("/api/pack-sizes", async (c) => {
    const body = await readJson(c);
    if (!body.ok) {
      return respondError(c, "INVALID_JSON", 400, "Request body must be a single JSON object");
    }

    const parsed = PackSizesUpdateRequestSchema.safeParse(body.value);
    if (!parsed.success) {
      return respondError(c, "INVALID_INPUT", 400, "Invalid pack sizes payload", parsed.error.flatten());
    }

    try {
      const packSizes = registry.set(parsed.data.pack_sizes);

      console.log(
        JSON.stringify({
          level: "info",
          ts: new Date().toISOString(),
          route: "/api/pack-sizes",
          request_id: c.get("request_id"),
          message: "pack sizes updated",
          pack_sizes: packSizes
        })
      );

      return c.json({ pack_sizes: [...packSizes] } satisfies PackSizesResponse);
    } catch (err) {
      return respondFailure(c, "/api/pack-sizes", err, "unable to update pack sizes");
    }
  });
  app.all("/api/pack-sizes", methodNotAllowed("GET, PUT"));

  if (config.staticDir) {
    // serveStatic resolves root against the working directory
    app.use("*", serveStatic({ root: relative(process.cwd(), resolve(config.staticDir)) }));
  }

  app.notFound((c) => respondError(c, "NOT_FOUND", 404, "not found"));

  app.onError((err, c) => respondFailure(c, c.req.path, err, "unexpected server error"));

  return app;
}

export type App = ReturnType<typeof createApp>;
