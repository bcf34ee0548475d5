import type { ArtifactType } from "../artifacts/artifact-type.js";
import { formatIssues } from "../artifacts/errors.js";
import { normalizeTags } from "../artifacts/normalize.js";
import { MAX_PAYLOAD_CHARS } from "../artifacts/types.js";
import type { Logger } from "../logger.js";
import type { Visibility } from "../schemas/visibility.js";
import { EngineError, InvocationFailure } from "./errors.js";

/** One raw value produced by an engine */
export interface Output {
  readonly type: string;
  readonly payload: unknown;
}

export function output<T>(type: ArtifactType<T>, payload: T): Output {
  return { type: type.name, payload };
}

/** Fixed count, or a bounded range the engine picks from */
export type FanOut = number | { min: number; max: number };

/**
 * Options accepted by `publishes()`.
 */
export interface PublishesOpts<T> {
  fan_out?: FanOut;
  where?(payload: T): boolean;
  validate?(payload: T): boolean;
  visibility?: Visibility;
  tags?: readonly string[];
  ttl_seconds?: number | null;
}

export interface OutputDeclaration<T = unknown> {
  readonly type: ArtifactType<T>;
  readonly fan_out?: { min: number; max: number; fixed: boolean };
  where?(payload: T): boolean;
  validate?(payload: T): boolean;
  readonly visibility?: Visibility;
  readonly tags: readonly string[];
  readonly ttl_seconds?: number | null;
}

export type EngineResult = Iterable<Output> | AsyncIterable<Output> | null | undefined;

function invalidFanOut(agent: string, type: string, message: string): EngineError {
  return new EngineError("INVALID_FAN_OUT", `${agent} → ${type}: ${message}`, {
    agent,
    output_type: type,
  });
}

export function declareOutput<T>(
  agent: string,
  type: ArtifactType<T>,
  opts: PublishesOpts<T> = {},
): OutputDeclaration<T> {
  let fan_out: OutputDeclaration<T>["fan_out"];
  if (typeof opts.fan_out === "number") {
    if (!Number.isInteger(opts.fan_out) || opts.fan_out < 1) {
      throw invalidFanOut(agent, type.name, "fan_out must be a positive integer");
    }
    fan_out = { min: opts.fan_out, max: opts.fan_out, fixed: true };
  } else if (opts.fan_out !== undefined) {
    const { min, max } = opts.fan_out;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < 1 || min > max) {
      throw invalidFanOut(agent, type.name, `invalid fan_out range [${min}, ${max}]`);
    }
    fan_out = { min, max, fixed: false };
  }

  return {
    type,
    fan_out,
    where: opts.where,
    validate: opts.validate,
    visibility: opts.visibility,
    tags: normalizeTags(opts.tags ?? []),
    ttl_seconds: opts.ttl_seconds,
  };
}

function isAsyncIterable(value: object): value is AsyncIterable<unknown> {
  return Symbol.asyncIterator in value;
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value;
}

function isOutput(value: unknown): value is Output {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    "payload" in value
  );
}

/**
 * Drain an engine result once. More than `cap` outputs fails with OUTPUT_LIMIT.
 */
export async function collectOutputs(result: unknown, cap: number): Promise<Output[]> {
  if (result === undefined || result === null) return [];
  if (typeof result !== "object") {
    throw new InvocationFailure(
      "ENGINE_ERROR",
      "engine must return an array, iterable or async iterable of outputs",
    );
  }

  const outputs: Output[] = [];
  const push = (item: unknown) => {
    if (!isOutput(item)) {
      throw new InvocationFailure(
        "ENGINE_ERROR",
        "engine yielded a value not built with output()",
      );
    }
    if (outputs.length >= cap) {
      throw new InvocationFailure(
        "OUTPUT_LIMIT",
        `engine produced more than ${cap} outputs`,
      );
    }
    outputs.push(item);
  };

  if (isAsyncIterable(result)) {
    for await (const item of result) push(item);
  } else if (isIterable(result)) {
    for (const item of result) push(item);
  } else {
    throw new InvocationFailure(
      "ENGINE_ERROR",
      "engine must return an array, iterable or async iterable of outputs",
    );
  }
  return outputs;
}

export interface MaterializedOutput {
  readonly declaration: OutputDeclaration;
  readonly payload: unknown;
}

export interface MaterializeResult {
  outputs: MaterializedOutput[]; // emission order
  dropped_count: number;
}

function safePredicate(
  fn: (payload: unknown) => boolean,
  payload: unknown,
): { keep: boolean; error?: unknown } {
  try {
    return { keep: fn(payload) === true };
  } catch (error) {
    return { keep: false, error };
  }
}

/**
 * Turn raw engine outputs into the set to publish, or throw.
 *
 * Per declared type: schema-validate every raw payload, then check
 * cardinality (fixed N exact; range truncates to max, fewer than min fails),
 * then prune with `where` (silent) and `validate` (warned). A surviving
 * payload over MAX_PAYLOAD_CHARS fails the whole set with OUTPUT_TOO_LARGE.
 */
export function materializeOutputs(
  agent: string,
  raw: readonly Output[],
  declarations: readonly OutputDeclaration[],
  logger: Logger,
): MaterializeResult {
  const byType = new Map<string, OutputDeclaration>(
    declarations.map((decl) => [decl.type.name, decl]),
  );

  // type → [emission index, parsed payload]
  const parsed = new Map<string, Array<[number, unknown]>>();
  raw.forEach((item, index) => {
    const decl = byType.get(item.type);
    if (decl === undefined) {
      throw new InvocationFailure(
        "UNDECLARED_OUTPUT",
        `${agent} produced undeclared type "${item.type}"`,
      );
    }
    const result = decl.type.safeParse(item.payload);
    if (!result.success) {
      throw new InvocationFailure(
        "SCHEMA_INVALID",
        `${agent} output ${index} of "${item.type}": ${formatIssues(result.issues)}`,
      );
    }
    const list = parsed.get(item.type) ?? [];
    list.push([index, result.data]);
    parsed.set(item.type, list);
  });

  const kept: Array<[number, MaterializedOutput]> = [];
  let dropped_count = 0;

  for (const decl of declarations) {
    let items = parsed.get(decl.type.name) ?? [];
    const range = decl.fan_out;

    if (range !== undefined) {
      if (range.fixed && items.length !== range.min) {
        throw new InvocationFailure(
          "FAN_OUT_MISMATCH",
          `${agent} produced ${items.length} "${decl.type.name}", expected exactly ${range.min}`,
        );
      }
      if (items.length < range.min) {
        throw new InvocationFailure(
          "FAN_OUT_MISMATCH",
          `${agent} produced ${items.length} "${decl.type.name}", expected at least ${range.min}`,
        );
      }
      if (items.length > range.max) {
        logger.debug(
          `${agent}: truncating ${items.length} "${decl.type.name}" outputs to ${range.max}`,
        );
        items = items.slice(0, range.max);
      }
    }

    for (const [index, payload] of items) {
      if (decl.where !== undefined) {
        const verdict = safePredicate((p) => decl.where?.(p) === true, payload);
        if (verdict.error !== undefined) {
          logger.warn(`${agent}: where on "${decl.type.name}" threw: ${String(verdict.error)}`);
        }
        if (!verdict.keep) {
          dropped_count++;
          continue;
        }
      }
      if (decl.validate !== undefined) {
        const verdict = safePredicate((p) => decl.validate?.(p) === true, payload);
        if (!verdict.keep) {
          const why = verdict.error !== undefined ? `threw: ${String(verdict.error)}` : "rejected output";
          logger.warn(`${agent}: validate on "${decl.type.name}" ${why}`);
          dropped_count++;
          continue;
        }
      }
      if (JSON.stringify(payload).length > MAX_PAYLOAD_CHARS) {
        throw new InvocationFailure(
          "OUTPUT_TOO_LARGE",
          `${agent} output ${index} of "${decl.type.name}" exceeds ${MAX_PAYLOAD_CHARS} chars`,
        );
      }
      kept.push([index, { declaration: decl, payload }]);
    }
  }

  kept.sort((a, b) => a[0] - b[0]);
  return { outputs: kept.map(([, item]) => item), dropped_count };
}

/** Declared output type names, for context and logs */
export function outputTypeNames(declarations: readonly OutputDeclaration[]): string[] {
  return declarations.map((decl) => decl.type.name);
}
