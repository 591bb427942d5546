import { describe, expect, it } from "vitest";
import {
  formatPackSizes,
  formatPlanSummary,
  parseItemsOrdered,
  parsePackSizes,
  readItemsOrderedParam,
  withItemsOrderedParam
} from "./packSizes";

describe("parseItemsOrdered", () => {
  it("accepts positive integers", () => {
    expect(parseItemsOrdered(" 12001 ")).toBe(12001);
  });

  it.each(["", "0", "-4", "2.5", "abc", "2147483648"])("rejects %j", (raw) => {
    expect(parseItemsOrdered(raw)).toBeNull();
  });
});

describe("parsePackSizes", () => {
  it("keeps first occurrences in input order", () => {
    expect(parsePackSizes("250, 500,250 ,1000")).toEqual([250, 500, 1000]);
  });

  it("requires a value", () => {
    expect(() => parsePackSizes("   ")).toThrow("pack_sizes is required.");
  });

  it("rejects empty entries", () => {
    expect(() => parsePackSizes("250,,500")).toThrow("pack_sizes must be a comma-separated list of integers.");
  });

  it("rejects non-positive and fractional sizes", () => {
    expect(() => parsePackSizes("250, 0")).toThrow("pack_sizes must contain only positive integers.");
    expect(() => parsePackSizes("1.5")).toThrow("pack_sizes must contain only positive integers.");
  });

  it("rejects sizes past the 32-bit bound", () => {
    expect(() => parsePackSizes("2147483648")).toThrow("pack_sizes must not exceed 2147483647.");
  });
});

describe("formatting", () => {
  it("joins pack sizes", () => {
    expect(formatPackSizes([5000, 2000, 250])).toBe("5000, 2000, 250");
  });

  it("summarizes a plan", () => {
    const summary = formatPlanSummary({
      items_ordered: 501,
      total_items: 750,
      total_packs: 2,
      packs: [
        { size: 500, count: 1 },
        { size: 250, count: 1 }
      ]
    });
    expect(summary).toBe("501 ordered -> 750 shipped in 2 pack(s).");
  });
});

describe("query string", () => {
  it("reads items_ordered", () => {
    expect(readItemsOrderedParam("?items_ordered=42&x=1")).toBe("42");
    expect(readItemsOrderedParam("")).toBeNull();
  });

  it("sets items_ordered and keeps other params", () => {
    expect(withItemsOrderedParam("/", "?theme=dark&items_ordered=1", 251)).toBe("/?theme=dark&items_ordered=251");
  });
});
