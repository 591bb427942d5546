import { MAX_PACK_VALUE, type PackBreakdown, type Plan } from "@packwise/shared";
import { PackingError, PackingInvariantError } from "../lib/errors";
import { normalizePackSizes } from "./packSizes";

export const DEFAULT_MAX_TABLE_ENTRIES = 2_000_000;

export type OptimizeOptions = {
  maxTableEntries?: number;
};

// Marks table entries that have no predecessor yet.
const UNSET = -1;

type PackingTable = {
  itemsOrdered: number;
  sortedPackSizes: readonly number[];
  fulfillmentLimit: number;
  minPacks: Int32Array;
  prevTotal: Int32Array;
  prevPack: Int32Array;
  unreachable: number;
};

/**
 * Finds the packs that ship at least `itemsOrdered` items with the least
 * overfill and, for that total, the fewest packs.
 */
export function optimize(itemsOrdered: number, packSizes: readonly number[], opts: OptimizeOptions = {}): Plan {
  if (!Number.isInteger(itemsOrdered) || itemsOrdered <= 0) {
    throw new PackingError("INVALID_ITEMS_ORDERED", `items_ordered must be greater than zero: ${itemsOrdered}`, itemsOrdered);
  }
  if (itemsOrdered > MAX_PACK_VALUE) {
    throw new PackingError(
      "INVALID_ITEMS_ORDERED",
      `items_ordered: ${itemsOrdered} exceeds max value ${MAX_PACK_VALUE}`,
      itemsOrdered
    );
  }

  const normalized = normalizePackSizes(packSizes);
  const table = createPackingTable(itemsOrdered, normalized, opts.maxTableEntries ?? DEFAULT_MAX_TABLE_ENTRIES);
  fillPackingTable(table);

  const chosenTotal = chooseFulfillmentTotal(table);
  const packs = buildBreakdown(table, chosenTotal);

  return Object.freeze({
    items_ordered: itemsOrdered,
    total_items: chosenTotal,
    total_packs: table.minPacks[chosenTotal],
    packs
  });
}

function createPackingTable(itemsOrdered: number, sortedPackSizes: readonly number[], maxTableEntries: number): PackingTable {
  const largest = sortedPackSizes[0];
  const smallest = sortedPackSizes[sortedPackSizes.length - 1];

  // Any total past this is beaten by some total reachable with the largest pack alone.
  const fulfillmentLimit = itemsOrdered + largest - 1;
  if (fulfillmentLimit <= 0) {
    throw new PackingError("OPTIMIZATION_TOO_LARGE", "optimization range is too large: invalid fulfillment range");
  }
  if (fulfillmentLimit + 1 > maxTableEntries) {
    throw new PackingError(
      "OPTIMIZATION_TOO_LARGE",
      `optimization range is too large: requires ${fulfillmentLimit + 1} table entries (max ${maxTableEntries})`,
      fulfillmentLimit + 1
    );
  }

  // Filling the whole range with the smallest pack is the worst case, so one
  // more than that can never be a real count.
  const unreachable = Math.floor(fulfillmentLimit / smallest) + 1;

  const size = fulfillmentLimit + 1;
  const minPacks = new Int32Array(size).fill(unreachable);
  const prevTotal = new Int32Array(size).fill(UNSET);
  const prevPack = new Int32Array(size).fill(UNSET);

  minPacks[0] = 0;
  prevTotal[0] = 0;
  prevPack[0] = 0;

  return { itemsOrdered, sortedPackSizes, fulfillmentLimit, minPacks, prevTotal, prevPack, unreachable };
}

/**
 * Records the fewest packs reaching every total up to the limit. Only a
 * strict improvement replaces an entry, so on equal counts the largest pack
 * size tried first stays in the backtracking pointers.
 */
function fillPackingTable(t: PackingTable): void {
  for (let total = 1; total <= t.fulfillmentLimit; total++) {
    for (const packSize of t.sortedPackSizes) {
      const pred = total - packSize;
      if (pred < 0 || t.minPacks[pred] === t.unreachable) continue;

      const candidate = t.minPacks[pred] + 1;
      if (candidate < t.minPacks[total]) {
        t.minPacks[total] = candidate;
        t.prevTotal[total] = pred;
        t.prevPack[total] = packSize;
      }
    }
  }
}

function chooseFulfillmentTotal(t: PackingTable): number {
  for (let total = t.itemsOrdered; total <= t.fulfillmentLimit; total++) {
    if (t.minPacks[total] !== t.unreachable) return total;
  }
  throw new PackingInvariantError("NO_PACKING_PLAN", "no valid packing combination found");
}

function buildBreakdown(t: PackingTable, chosenTotal: number): PackBreakdown[] {
  const counts = new Map<number, number>();
  for (let total = chosenTotal; total > 0; total = t.prevTotal[total]) {
    const packSize = t.prevPack[total];
    if (packSize <= 0) {
      throw new PackingInvariantError("BROKEN_BACKTRACK", `unable to reconstruct packing combination at total ${total}`);
    }
    counts.set(packSize, (counts.get(packSize) ?? 0) + 1);
  }

  const packs: PackBreakdown[] = [];
  for (const size of t.sortedPackSizes) {
    const count = counts.get(size) ?? 0;
    if (count > 0) packs.push({ size, count });
  }
  return packs;
}
