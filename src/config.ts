/**
 * Blackboard configuration resolution.
 *
 * Three entry points:
 *   1. resolveConfig(raw)        — validate a partial object, fill defaults
 *   2. loadConfigFromEnv(env)    — BLACKBOARD_* environment variables
 *   3. loadConfig({ path, env }) — JSON file, overridden by env
 */

import * as fs from "node:fs";
import { InMemoryBlackboardStore } from "./artifacts/memory.js";
import { SqliteBlackboardStore } from "./artifacts/sqlite.js";
import type { BlackboardStore } from "./artifacts/store.js";
import { EngineError } from "./engine/errors.js";
import {
  type BlackboardConfig,
  BlackboardConfigSchema,
} from "./schemas/config.js";

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return Object.fromEntries(Object.entries(v));
  }
  return {};
}

function toNumber(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === "") return undefined;
  return Number(v);
}

export function resolveConfig(raw: unknown = {}): BlackboardConfig {
  const result = BlackboardConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new EngineError(
      "INVALID_CONFIG",
      `Invalid blackboard config: ${issues.join("; ")}`,
      { issues },
    );
  }
  return result.data;
}

/**
 * Raw (unvalidated) overrides from BLACKBOARD_* variables.
 * Unset variables are left out so file values and defaults survive.
 */
export function readEnvOverrides(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  const numeric: Array<[string, string]> = [
    ["BLACKBOARD_MAX_CONCURRENCY", "max_concurrency"],
    ["BLACKBOARD_INVOCATION_TIMEOUT_MS", "invocation_timeout_ms"],
    ["BLACKBOARD_MAX_RETRIES", "max_retries"],
    ["BLACKBOARD_IDLE_TIMEOUT_MS", "idle_timeout_ms"],
    ["BLACKBOARD_SEMANTIC_THRESHOLD", "semantic_threshold"],
    ["BLACKBOARD_MAX_OUTPUTS", "max_outputs_per_invocation"],
  ];
  for (const [name, key] of numeric) {
    const value = toNumber(env[name]);
    if (value !== undefined) raw[key] = value;
  }
  if (env.BLACKBOARD_LOG_LEVEL) raw.log_level = env.BLACKBOARD_LOG_LEVEL;

  const store: Record<string, unknown> = {};
  if (env.BLACKBOARD_STORE_BACKEND) store.backend = env.BLACKBOARD_STORE_BACKEND;
  if (env.BLACKBOARD_DB_PATH) store.db_path = env.BLACKBOARD_DB_PATH;
  if (Object.keys(store).length > 0) raw.store = store;

  return raw;
}

export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): BlackboardConfig {
  return resolveConfig(readEnvOverrides(env));
}

/**
 * Load config from an optional JSON file, then apply env overrides.
 * File path falls back to BLACKBOARD_CONFIG.
 */
export function loadConfig(
  opts: { path?: string; env?: NodeJS.ProcessEnv } = {},
): BlackboardConfig {
  const env = opts.env ?? process.env;
  const configPath = opts.path ?? env.BLACKBOARD_CONFIG;

  let fileConfig: Record<string, unknown> = {};
  if (configPath) {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw new EngineError(
        "INVALID_CONFIG",
        `Invalid blackboard config at ${configPath}: expected a JSON object`,
      );
    }
    fileConfig = toRecord(raw);
  }

  const overrides = readEnvOverrides(env);
  const merged: Record<string, unknown> = { ...fileConfig, ...overrides };
  if (overrides.store !== undefined) {
    merged.store = { ...toRecord(fileConfig.store), ...toRecord(overrides.store) };
  }
  return resolveConfig(merged);
}

export function createStore(
  config: BlackboardConfig,
  now?: () => number,
): BlackboardStore {
  switch (config.store.backend) {
    case "memory":
      return new InMemoryBlackboardStore({ now });
    case "sqlite":
      return new SqliteBlackboardStore({ dbPath: config.store.db_path, now });
  }
}
