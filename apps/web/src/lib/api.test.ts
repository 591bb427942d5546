import { afterEach, describe, expect, it, vi } from "vitest";
import { ApiError, getPackSizes, optimizeOrder, updatePackSizes } from "./api";

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("optimizeOrder", () => {
  it("posts the quantity and returns the plan", async () => {
    const plan = { items_ordered: 251, total_items: 500, total_packs: 1, packs: [{ size: 500, count: 1 }] };
    const fetchMock = stubFetch(jsonResponse(plan));

    await expect(optimizeOrder({ items_ordered: 251 })).resolves.toEqual(plan);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("/api/optimize");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"items_ordered":251}');
    const headers = new Headers(init?.headers);
    expect(headers.get("content-type")).toBe("application/json");
    expect(headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("raises the server's error code and message", async () => {
    stubFetch(
      jsonResponse(
        { error: { code: "INVALID_ITEMS_ORDERED", message: "items_ordered must be greater than zero: 0", request_id: "req-9" } },
        400
      )
    );

    const err = await optimizeOrder({ items_ordered: 0 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      code: "INVALID_ITEMS_ORDERED",
      status: 400,
      requestId: "req-9",
      message: "items_ordered must be greater than zero: 0"
    });
  });

  it("falls back to the HTTP status when the error body is not JSON", async () => {
    stubFetch(new Response("Bad Gateway", { status: 502, headers: { "x-request-id": "edge-1" } }));

    const err = await optimizeOrder({ items_ordered: 5 }).catch((e: unknown) => e);
    expect(err).toMatchObject({ code: "HTTP_502", status: 502, requestId: "edge-1" });
  });

  it("rejects a success body that is not a plan", async () => {
    stubFetch(jsonResponse({ unexpected: true }));
    await expect(optimizeOrder({ items_ordered: 5 })).rejects.toThrow();
  });
});

describe("pack sizes", () => {
  it("reads the configured sizes", async () => {
    const fetchMock = stubFetch(jsonResponse({ pack_sizes: [5000, 250] }));

    await expect(getPackSizes()).resolves.toEqual({ pack_sizes: [5000, 250] });
    expect(fetchMock.mock.calls[0][0]).toBe("/api/pack-sizes");
  });

  it("sends updates with PUT", async () => {
    const fetchMock = stubFetch(jsonResponse({ pack_sizes: [20, 10] }));

    await expect(updatePackSizes({ pack_sizes: [10, 20] })).resolves.toEqual({ pack_sizes: [20, 10] });
    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe("PUT");
    expect(init?.body).toBe('{"pack_sizes":[10,20]}');
  });
});
