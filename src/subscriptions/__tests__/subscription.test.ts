import { describe, expect, test } from "vitest";
import { EngineError } from "../../engine/errors.js";
import { createSubscription } from "../subscription.js";
import type { ConsumeOpts } from "../types.js";

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("createSubscription", () => {
  test("assigns an id from agent and index", () => {
    const sub = createSubscription("radiologist", 1, ["XRay"]);
    expect(sub.id).toBe("radiologist#1");
    expect(sub.types).toEqual(["XRay"]);
  });

  test("normalizes tag filters", () => {
    const sub = createSubscription("a", 0, ["T"], { tags: [" VIP", "vip"] });
    expect(sub.tags).toEqual(["vip"]);
  });

  const invalidCases: [string, string[], ConsumeOpts<unknown>][] = [
    ["no types", [], {}],
    ["duplicate types", ["XRay", "XRay"], {}],
    ["join with one type", ["XRay"], { join: { by: () => "k", within_ms: 10 } }],
    ["join without window", ["XRay", "Lab"], { join: { by: () => "k", within_ms: 0 } }],
    ["empty batch", ["Order"], { batch: {} }],
    ["fractional batch size", ["Order"], { batch: { size: 2.5 } }],
    ["negative batch timeout", ["Order"], { batch: { timeout_ms: -1 } }],
    ["blank semantic query", ["Ticket"], { semantic: { query: "  " } }],
    ["threshold above 1", ["Ticket"], { semantic: { query: "x", threshold: 1.5 } }],
    ["empty tag filter", ["Ticket"], { tags: [" "] }],
  ];

  test.each(invalidCases)("rejects %s", (_label, types, opts) => {
    const err = catchError(() => createSubscription("agent", 0, types, opts));
    expect(err).toBeInstanceOf(EngineError);
    expect(err).toMatchObject({
      code: "INVALID_SUBSCRIPTION",
      details: { agent: "agent", subscription_id: "agent#0" },
    });
  });

  test("join over two types with a batch is accepted", () => {
    const sub = createSubscription("a", 0, ["XRay", "Lab"], {
      join: { by: () => "k", within_ms: 1000 },
      batch: { size: 5 },
    });
    expect(sub.join?.within_ms).toBe(1000);
    expect(sub.batch).toEqual({ size: 5 });
  });
});
