import {
  ApiErrorPayloadSchema,
  PackSizesResponseSchema,
  PlanSchema,
  type OptimizeRequest,
  type PackSizesResponse,
  type PackSizesUpdateRequest,
  type Plan
} from "@packwise/shared";
import type { z } from "zod";

type FetchJsonInit = Omit<RequestInit, "body"> & { json?: unknown };

function apiBase(): string {
  // Same origin in production; Vite proxies /api in dev
  return import.meta.env.VITE_API_BASE_URL ?? "/api";
}

export class ApiError extends Error {
  public readonly code: string;
  public readonly requestId: string | null;
  public readonly status: number;

  constructor(code: string, status: number, requestId: string | null, message: string) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.status = status;
    this.requestId = requestId;
  }
}

function newRequestId() {
  return crypto.randomUUID();
}

async function apiFetch<S extends z.ZodTypeAny>(path: string, schema: S, init: FetchJsonInit = {}) {
  const requestId = newRequestId();
  const { json, ...rest } = init;
  const headers = new Headers(init.headers);
  headers.set("x-request-id", requestId);

  if (json !== undefined) {
    headers.set("content-type", "application/json");
  }

  const res = await fetch(apiBase() + path, {
    ...rest,
    headers,
    body: json !== undefined ? JSON.stringify(json) : undefined
  });

  const text = await res.text();
  let parsed: unknown = null;
  if (text) {
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = null;
    }
  }

  const serverRequestId = res.headers.get("x-request-id") || requestId;

  if (!res.ok) {
    const payload = ApiErrorPayloadSchema.safeParse(parsed);
    if (!payload.success) {
      throw new ApiError(`HTTP_${res.status}`, res.status, serverRequestId, `HTTP_${res.status}`);
    }
    const { code, message, request_id } = payload.data.error;
    throw new ApiError(code, res.status, request_id ?? serverRequestId, message);
  }

  const data: z.infer<S> = schema.parse(parsed);
  return { data, requestId: serverRequestId };
}

async function fetchJson<S extends z.ZodTypeAny>(path: string, schema: S, init: FetchJsonInit = {}): Promise<z.infer<S>> {
  const { data } = await apiFetch(path, schema, init);
  return data;
}

export async function getPackSizes(): Promise<PackSizesResponse> {
  return fetchJson("/pack-sizes", PackSizesResponseSchema);
}

export async function updatePackSizes(req: PackSizesUpdateRequest): Promise<PackSizesResponse> {
  return fetchJson("/pack-sizes", PackSizesResponseSchema, { method: "PUT", json: req });
}

export async function optimizeOrder(req: OptimizeRequest): Promise<Plan> {
  return fetchJson("/optimize", PlanSchema, { method: "POST", json: req });
}
