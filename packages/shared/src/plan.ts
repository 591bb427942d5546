import { z } from "zod";

// Largest signed 32-bit value; bounds both order quantities and pack sizes.
export const MAX_PACK_VALUE = 2_147_483_647;

export const DEFAULT_PACK_SIZES: readonly number[] = [250, 500, 1000, 2000, 5000];

export const PackBreakdownSchema = z.object({
  size: z.number().int().positive(),
  count: z.number().int().positive()
});
export type PackBreakdown = z.infer<typeof PackBreakdownSchema>;

export const PlanSchema = z.object({
  items_ordered: z.number().int().positive(),
  total_items: z.number().int().positive(),
  total_packs: z.number().int().positive(),
  packs: z.array(PackBreakdownSchema)
});
export type Plan = z.infer<typeof PlanSchema>;

// Range checks are left to the optimizer so it can report the offending value.
export const OptimizeRequestSchema = z
  .object({
    items_ordered: z.number().int()
  })
  .strict();
export type OptimizeRequest = z.infer<typeof OptimizeRequestSchema>;

export const PackSizesUpdateRequestSchema = z
  .object({
    pack_sizes: z.array(z.number().int())
  })
  .strict();
export type PackSizesUpdateRequest = z.infer<typeof PackSizesUpdateRequestSchema>;

export const PackSizesResponseSchema = z.object({
  pack_sizes: z.array(z.number().int().positive())
});
export type PackSizesResponse = z.infer<typeof PackSizesResponseSchema>;

export const HealthResponseSchema = z.object({
  status: z.literal("ok")
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
