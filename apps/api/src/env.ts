import { DEFAULT_PACK_SIZES, MAX_PACK_VALUE } from "@packwise/shared";
import { z } from "zod";
import { ConfigError } from "./lib/errors";
import { DEFAULT_MAX_TABLE_ENTRIES } from "./services/optimizer";

export type Env = {
  PORT?: string; // default 8080
  HOST?: string; // default 0.0.0.0

  // Web UI origin allowed by CORS (Vite dev server by default)
  ALLOWED_ORIGIN?: string;

  // Comma-separated seed for the pack-size registry, e.g. "250,500,1000"
  DEFAULT_PACK_SIZES?: string;

  // Upper bound on optimizer table entries (at most 2147483647)
  MAX_TABLE_ENTRIES?: string;

  // Built web UI to serve on non-API paths (optional)
  STATIC_DIR?: string;

  SHUTDOWN_TIMEOUT_MS?: string; // e.g. "5000"
};

// Hono context for every route: the request id set by the observability middleware.
export type AppEnv = {
  Variables: {
    request_id: string;
  };
};

const PackSizeListSchema = z
  .string()
  .transform((raw) => raw.split(",").map((part) => part.trim()).filter(Boolean))
  .pipe(z.array(z.coerce.number().int().positive()).min(1));

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().min(1).default("0.0.0.0"),
  ALLOWED_ORIGIN: z.string().url().default("http://localhost:5173"),
  DEFAULT_PACK_SIZES: PackSizeListSchema.optional(),
  MAX_TABLE_ENTRIES: z.coerce.number().int().positive().max(MAX_PACK_VALUE).default(DEFAULT_MAX_TABLE_ENTRIES),
  STATIC_DIR: z.string().min(1).optional(),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000)
});

export type AppConfig = {
  port: number;
  host: string;
  allowedOrigin: string;
  defaultPackSizes: number[];
  maxTableEntries: number;
  staticDir: string | null;
  shutdownTimeoutMs: number;
};

export function loadConfig(env: Env): AppConfig {
  // Blank variables count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const cfg = parsed.data;
  return {
    port: cfg.PORT,
    host: cfg.HOST,
    allowedOrigin: cfg.ALLOWED_ORIGIN,
    defaultPackSizes: cfg.DEFAULT_PACK_SIZES ?? [...DEFAULT_PACK_SIZES],
    maxTableEntries: cfg.MAX_TABLE_ENTRIES,
    staticDir: cfg.STATIC_DIR ?? null,
    shutdownTimeoutMs: cfg.SHUTDOWN_TIMEOUT_MS
  };
}
