import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const BackoffConfigSchema = z
  .object({
    base_ms: z.number().int().nonnegative().default(100),
    max_ms: z.number().int().nonnegative().default(10_000),
    factor: z.number().min(1).default(2),
    jitter: z.number().min(0).max(1).default(0.25), // 0.25 = ±25%
  })
  .strict();

export const StoreConfigSchema = z
  .object({
    backend: z.enum(["memory", "sqlite"]).default("memory"),
    db_path: z.string().min(1).default(".blackboard/artifacts.db"),
  })
  .strict();

export const BlackboardConfigSchema = z
  .object({
    max_concurrency: z.number().int().min(1).default(8),
    invocation_timeout_ms: z.number().int().positive().default(60_000),
    max_retries: z.number().int().nonnegative().default(0),
    backoff: BackoffConfigSchema.default({}),
    idle_timeout_ms: z.number().int().positive().default(30_000),
    semantic_threshold: z.number().min(0).max(1).default(0.4),
    max_outputs_per_invocation: z.number().int().positive().default(1000),
    log_level: LogLevelSchema.default("info"),
    store: StoreConfigSchema.default({}),
  })
  .strict();

export type BlackboardConfig = z.infer<typeof BlackboardConfigSchema>;
export type BlackboardConfigInput = z.input<typeof BlackboardConfigSchema>;
export type BackoffConfig = z.infer<typeof BackoffConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
