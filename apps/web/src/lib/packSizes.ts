import { MAX_PACK_VALUE, type Plan } from "@packwise/shared";

export function parseItemsOrdered(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const n = Number(trimmed);
  if (!Number.isInteger(n) || n <= 0 || n > MAX_PACK_VALUE) return null;
  return n;
}

/** Parses "250, 500, 1000" into distinct sizes in input order; the server sorts them. */
export function parsePackSizes(raw: string): number[] {
  const value = raw.trim();
  if (value === "") {
    throw new Error("pack_sizes is required.");
  }

  const parsed: number[] = [];
  const seen = new Set<number>();

  for (const part of value.split(",")) {
    const trimmed = part.trim();
    if (trimmed === "") {
      throw new Error("pack_sizes must be a comma-separated list of integers.");
    }

    const n = Number(trimmed);
    if (!Number.isInteger(n) || n <= 0) {
      throw new Error("pack_sizes must contain only positive integers.");
    }
    if (n > MAX_PACK_VALUE) {
      throw new Error(`pack_sizes must not exceed ${MAX_PACK_VALUE}.`);
    }

    if (!seen.has(n)) {
      seen.add(n);
      parsed.push(n);
    }
  }

  return parsed;
}

export function formatPackSizes(sizes: readonly number[]): string {
  return sizes.join(", ");
}

export function formatPlanSummary(plan: Plan): string {
  return `${plan.items_ordered} ordered -> ${plan.total_items} shipped in ${plan.total_packs} pack(s).`;
}

export function readItemsOrderedParam(search: string): string | null {
  return new URLSearchParams(search).get("items_ordered");
}

export function withItemsOrderedParam(pathname: string, search: string, itemsOrdered: number): string {
  const params = new URLSearchParams(search);
  params.set("items_ordered", String(itemsOrdered));
  return `${pathname}?${params.toString()}`;
}
