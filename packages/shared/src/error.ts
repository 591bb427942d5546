import { z } from "zod";

export const ErrorCodeSchema = z.enum([
  "INVALID_INPUT",
  "INVALID_JSON",
  "INVALID_ITEMS_ORDERED",
  "INVALID_PACK_SIZES",
  "OPTIMIZATION_TOO_LARGE",
  "METHOD_NOT_ALLOWED",
  "NOT_FOUND",
  "INTERNAL_ERROR"
]);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ApiErrorPayloadSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    request_id: z.string().optional(),
    details: z.unknown().optional()
  })
});
export type ApiErrorPayload = z.infer<typeof ApiErrorPayloadSchema>;
