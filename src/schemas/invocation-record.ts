import { z } from "zod";

export const InvocationErrorCodeSchema = z.enum([
  "TIMEOUT",
  "ENGINE_ERROR",
  "NO_ENGINE",
  "SCHEMA_INVALID",
  "UNDECLARED_OUTPUT",
  "FAN_OUT_MISMATCH",
  "OUTPUT_LIMIT",
  "OUTPUT_TOO_LARGE",
  "CANCELLED",
]);

export const InvocationStatusSchema = z.enum([
  "PENDING",
  "RUNNING",
  "OK",
  "FAILED",
  "CANCELLED",
]);

export const InvocationTriggerSchema = z.enum(["direct", "join", "batch", "timer"]);

const InvocationEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("STARTED"), at: z.string() }),
  z.object({
    type: z.literal("RETRY"),
    at: z.string(),
    error: InvocationErrorCodeSchema,
  }),
  z.object({ type: z.literal("OK"), at: z.string() }),
  z.object({ type: z.literal("FAILED"), at: z.string() }),
  z.object({ type: z.literal("CANCELLED"), at: z.string() }),
]);

export const InvocationRecordSchema = z
  .object({
    invocation_id: z.string(),
    agent: z.string(),
    subscription_id: z.string(),
    trigger: InvocationTriggerSchema,
    input_ids: z.array(z.string()),
    timer_iteration: z.number().int().nonnegative().optional(),
    status: InvocationStatusSchema,
    events: z.array(InvocationEventSchema),
    output_ids: z.array(z.string()),
    dropped_count: z.number().int().nonnegative(),
    retry_count: z.number().int().nonnegative(),
    error_code: InvocationErrorCodeSchema.optional(),
    error_message: z.string().optional(),
    started_at: z.string(),
    finished_at: z.string().optional(),
  })
  .strict()
  .refine((record) => record.trigger === "timer" || record.input_ids.length > 0, {
    message: "only timer fires may have no inputs",
    path: ["input_ids"],
  });

export type InvocationRecord = z.infer<typeof InvocationRecordSchema>;
export type InvocationEvent = z.infer<typeof InvocationEventSchema>;
export type InvocationErrorCode = z.infer<typeof InvocationErrorCodeSchema>;
export type InvocationStatus = z.infer<typeof InvocationStatusSchema>;
export type InvocationTrigger = z.infer<typeof InvocationTriggerSchema>;
