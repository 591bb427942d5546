import { MAX_PACK_VALUE } from "@packwise/shared";
import { describe, expect, it } from "vitest";
import { PackingError } from "../lib/errors";
import { normalizePackSizes, PackSizeRegistry } from "./packSizes";

describe("normalizePackSizes", () => {
  it("sorts descending and drops duplicates", () => {
    expect(normalizePackSizes([10, 40, 20, 10])).toEqual([40, 20, 10]);
  });

  it("is idempotent", () => {
    const once = normalizePackSizes([500, 250, 250, 1000]);
    expect(normalizePackSizes(once)).toEqual(once);
  });

  it("ignores input order and repetition", () => {
    expect(normalizePackSizes([250, 1000, 500])).toEqual(normalizePackSizes([1000, 500, 500, 250, 1000]));
  });

  it("does not mutate its input", () => {
    const input = [250, 500, 1000];
    normalizePackSizes(input);
    expect(input).toEqual([250, 500, 1000]);
  });

  it("accepts the largest 32-bit value", () => {
    expect(normalizePackSizes([1, MAX_PACK_VALUE])).toEqual([MAX_PACK_VALUE, 1]);
  });

  it("rejects an empty list", () => {
    expect(() => normalizePackSizes([])).toThrow(PackingError);
  });

  it.each([
    { sizes: [250, 0], offending: 0, message: "pack_sizes must contain only positive integers: 0" },
    { sizes: [-3], offending: -3, message: "pack_sizes must contain only positive integers: -3" },
    { sizes: [2.5], offending: 2.5, message: "pack_sizes must contain only positive integers: 2.5" },
    {
      sizes: [MAX_PACK_VALUE + 1],
      offending: MAX_PACK_VALUE + 1,
      message: "pack_sizes: 2147483648 exceeds max value 2147483647"
    }
  ])("names the offending value $offending", ({ sizes, offending, message }) => {
    expect(() => normalizePackSizes(sizes)).toThrow(message);
    try {
      normalizePackSizes(sizes);
    } catch (err) {
      expect(err).toMatchObject({ code: "INVALID_PACK_SIZES", value: offending });
    }
  });
});

describe("PackSizeRegistry", () => {
  it("normalizes the initial sizes", () => {
    const registry = new PackSizeRegistry([250, 500, 1000]);
    expect(registry.get()).toEqual([1000, 500, 250]);
  });

  it("refuses invalid initial sizes", () => {
    expect(() => new PackSizeRegistry([])).toThrow(PackingError);
  });

  it("hands out frozen snapshots", () => {
    const registry = new PackSizeRegistry([250, 500, 1000]);
    expect(Object.isFrozen(registry.get())).toBe(true);
  });

  it("replaces sizes without touching earlier snapshots", () => {
    const registry = new PackSizeRegistry([250, 500, 1000]);
    const before = registry.get();

    expect(registry.set([10, 40, 20, 10])).toEqual([40, 20, 10]);
    expect(registry.get()).toEqual([40, 20, 10]);
    expect(before).toEqual([1000, 500, 250]);
  });

  it("keeps the current sizes when an update is invalid", () => {
    const registry = new PackSizeRegistry([250, 500, 1000]);
    expect(() => registry.set([0, 250])).toThrow("pack_sizes must contain only positive integers: 0");
    expect(registry.get()).toEqual([1000, 500, 250]);
  });

  it("keeps separate state per instance", () => {
    const a = new PackSizeRegistry([5]);
    const b = new PackSizeRegistry([7]);
    a.set([9]);
    expect(b.get()).toEqual([7]);
  });
});
