import { MAX_PACK_VALUE } from "@packwise/shared";
import { PackingError } from "../lib/errors";

/**
 * Validates pack sizes, drops duplicates and sorts them largest first so the
 * optimizer tries big packs before small ones.
 */
export function normalizePackSizes(packSizes: readonly number[]): number[] {
  if (packSizes.length === 0) {
    throw new PackingError("INVALID_PACK_SIZES", "pack_sizes must contain at least one positive integer");
  }

  const seen = new Set<number>();
  const normalized: number[] = [];
  for (const size of packSizes) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new PackingError("INVALID_PACK_SIZES", `pack_sizes must contain only positive integers: ${size}`, size);
    }
    if (size > MAX_PACK_VALUE) {
      throw new PackingError(
        "INVALID_PACK_SIZES",
        `pack_sizes: ${size} exceeds max value ${MAX_PACK_VALUE}`,
        size
      );
    }
    if (seen.has(size)) continue;
    seen.add(size);
    normalized.push(size);
  }

  if (normalized.length === 0) {
    throw new PackingError("INVALID_PACK_SIZES", "pack_sizes must contain at least one positive integer");
  }

  return normalized.sort((a, b) => b - a);
}

/**
 * Server-wide pack sizes. Readers get a frozen snapshot; writers swap in a
 * new one, so an optimization in flight never sees a partial update.
 */
export class PackSizeRegistry {
  private snapshot: readonly number[];

  constructor(initial: readonly number[]) {
    this.snapshot = Object.freeze(normalizePackSizes(initial));
  }

  get(): readonly number[] {
    return this.snapshot;
  }

  set(packSizes: readonly number[]): readonly number[] {
    const next = Object.freeze(normalizePackSizes(packSizes));
    this.snapshot = next;
    return next;
  }
}
