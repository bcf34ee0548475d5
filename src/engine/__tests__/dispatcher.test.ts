import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { Artifact } from "../../artifacts/types.js";
import type { Logger } from "../../logger.js";
import { LexicalEmbedder } from "../../subscriptions/embedder.js";
import { createSubscription } from "../../subscriptions/subscription.js";
import type { ConsumeOpts } from "../../subscriptions/types.js";
import { type AgentDefinition, createAgentDefinition } from "../agent.js";
import { type DispatchTarget, Dispatcher, type MatchGroup } from "../dispatcher.js";

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

let seq = 0;
function createMockArtifact(overrides: Partial<Artifact> = {}): Artifact {
  seq++;
  return {
    id: `A${seq}`,
    type: "Order",
    payload: { order_id: "o-1", amount: 10 },
    produced_by: "external",
    tags: [],
    visibility: { kind: "public" },
    created_at: 0,
    ...overrides,
  };
}

interface OrderLike {
  order_id: string;
  amount?: number;
}

function target(
  agent: AgentDefinition,
  types: string[],
  opts: ConsumeOpts<OrderLike> = {},
): DispatchTarget {
  const subscription = createSubscription(agent.name, agent.subscriptions.length, types, opts);
  agent.subscriptions.push(subscription);
  return { agent, subscription };
}

describe("Dispatcher", () => {
  let clock: number;
  let groups: MatchGroup[];
  let logger: ReturnType<typeof createMockLogger>;
  let onBatchChange: ReturnType<typeof vi.fn>;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    vi.useFakeTimers();
    seq = 0;
    clock = 0;
    groups = [];
    logger = createMockLogger();
    onBatchChange = vi.fn();
    dispatcher = new Dispatcher({
      embedder: new LexicalEmbedder(),
      semanticThreshold: 0.4,
      logger,
      now: () => clock,
      onGroup: (group) => groups.push(group),
      onBatchChange,
    });
  });

  afterEach(() => {
    dispatcher.dispose();
    vi.useRealTimers();
  });

  describe("direct delivery", () => {
    test("emits one group per matching subscription", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order"]);
      const audit = target(createAgentDefinition("audit"), ["Order"]);
      const order = createMockArtifact();

      await dispatcher.dispatch(order, [billing, audit]);

      expect(groups.map((g) => [g.agent.name, g.trigger, g.inputs])).toEqual([
        ["billing", "direct", [order]],
        ["audit", "direct", [order]],
      ]);
      expect(dispatcher.matchLog().map((e) => [e.agent, e.outcome])).toEqual([
        ["billing", "delivered"],
        ["audit", "delivered"],
      ]);
    });

    test("type mismatches are neither delivered nor logged", async () => {
      const billing = target(createAgentDefinition("billing"), ["Payment"]);
      await dispatcher.dispatch(createMockArtifact(), [billing]);
      expect(groups).toEqual([]);
      expect(dispatcher.matchLog()).toEqual([]);
    });

    test("delivers an artifact to a subscription at most once", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order"]);
      const order = createMockArtifact();

      await dispatcher.dispatch(order, [billing]);
      await dispatcher.dispatch(order, [billing]);

      expect(groups).toHaveLength(1);
      expect(dispatcher.matchLog({ outcome: "filtered" })).toMatchObject([
        { artifact_id: order.id, reason: "duplicate" },
      ]);
    });

    test("records the first filter stage that rejects", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order"], {
        where: (p) => (p.amount ?? 0) > 100,
      });
      const order = createMockArtifact();

      await dispatcher.dispatch(order, [billing]);

      expect(groups).toEqual([]);
      expect(dispatcher.matchLog()).toEqual([
        {
          artifact_id: order.id,
          artifact_type: "Order",
          agent: "billing",
          subscription_id: "billing#0",
          outcome: "filtered",
          reason: "where",
          at: 0,
        },
      ]);
    });

    test("skips the agent's own outputs", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order"]);
      await dispatcher.dispatch(createMockArtifact({ produced_by: "billing" }), [billing]);
      expect(groups).toEqual([]);
      expect(dispatcher.matchLog()[0]?.reason).toBe("self");
    });

    test("a throwing predicate drops the artifact for that subscription only", async () => {
      const broken = target(createAgentDefinition("broken"), ["Order"], {
        where: () => {
          throw new Error("boom");
        },
      });
      const billing = target(createAgentDefinition("billing"), ["Order"]);
      const order = createMockArtifact();

      await dispatcher.dispatch(order, [broken, billing]);

      expect(groups.map((g) => g.agent.name)).toEqual(["billing"]);
      expect(dispatcher.matchLog({ agent: "broken" })).toMatchObject([
        { outcome: "error", reason: "where" },
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        `broken#0: where predicate failed on Order ${order.id}: boom`,
      );
    });
  });

  describe("joins", () => {
    const byOrder: ConsumeOpts<OrderLike> = {
      join: { by: (p) => p.order_id, within_ms: 1000 },
    };

    test("pairs artifacts that share a key within the window", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order", "Payment"], byOrder);
      const payment = createMockArtifact({ type: "Payment" });
      const order = createMockArtifact();

      await dispatcher.dispatch(payment, [billing]);
      expect(groups).toEqual([]);
      expect(dispatcher.pendingJoins).toBe(1);

      clock = 1000;
      await dispatcher.dispatch(order, [billing]);

      expect(groups).toHaveLength(1);
      expect(groups[0]?.trigger).toBe("join");
      expect(groups[0]?.inputs).toEqual([order, payment]);
      expect(dispatcher.pendingJoins).toBe(0);
    });

    test("artifacts further apart than the window never match", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order", "Payment"], byOrder);
      const order = createMockArtifact();
      const payment = createMockArtifact({ type: "Payment" });

      await dispatcher.dispatch(order, [billing]);
      clock = 1001;
      await dispatcher.dispatch(payment, [billing]);

      expect(groups).toEqual([]);
      expect(dispatcher.pendingJoins).toBe(1);
      expect(dispatcher.matchLog({ outcome: "expired" })).toMatchObject([
        { artifact_id: order.id, reason: "join_window", at: 1001 },
      ]);
    });

    test("different keys do not pair", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order", "Payment"], byOrder);
      await dispatcher.dispatch(createMockArtifact(), [billing]);
      await dispatcher.dispatch(
        createMockArtifact({ type: "Payment", payload: { order_id: "o-2" } }),
        [billing],
      );
      expect(groups).toEqual([]);
      expect(dispatcher.pendingJoins).toBe(2);
    });

    test("a throwing key function is logged as an error", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order", "Payment"], {
        join: {
          by: () => {
            throw new Error("no key");
          },
          within_ms: 1000,
        },
      });
      const order = createMockArtifact();

      await dispatcher.dispatch(order, [billing]);

      expect(dispatcher.matchLog()).toMatchObject([{ outcome: "error", reason: "join" }]);
      expect(logger.warn).toHaveBeenCalledWith(
        `billing#0: join key failed on Order ${order.id}: no key`,
      );
      expect(dispatcher.pendingJoins).toBe(0);
    });
  });

  describe("batches", () => {
    test("flushes when the buffer reaches its size", async () => {
      const payments = target(createAgentDefinition("payments"), ["Order"], {
        batch: { size: 2 },
      });
      const first = createMockArtifact();
      const second = createMockArtifact();

      await dispatcher.dispatch(first, [payments]);
      expect(groups).toEqual([]);
      expect(dispatcher.bufferedUnits).toBe(1);
      expect(dispatcher.openBatches).toBe(0);

      await dispatcher.dispatch(second, [payments]);
      expect(groups).toHaveLength(1);
      expect(groups[0]?.trigger).toBe("batch");
      expect(groups[0]?.inputs).toEqual([first, second]);
      expect(dispatcher.bufferedUnits).toBe(0);
    });

    test("flushes on timeout measured from the first unit", async () => {
      const payments = target(createAgentDefinition("payments"), ["Order"], {
        batch: { size: 3, timeout_ms: 100 },
      });
      const first = createMockArtifact();

      await dispatcher.dispatch(first, [payments]);
      expect(dispatcher.openBatches).toBe(1);

      await vi.advanceTimersByTimeAsync(99);
      expect(groups).toEqual([]);

      await vi.advanceTimersByTimeAsync(1);
      expect(groups).toHaveLength(1);
      expect(groups[0]?.inputs).toEqual([first]);
      expect(dispatcher.openBatches).toBe(0);
      expect(onBatchChange).toHaveBeenCalledTimes(2);
    });

    test("flushBatches empties every open buffer", async () => {
      const payments = target(createAgentDefinition("payments"), ["Order"], {
        batch: { size: 10 },
      });
      await dispatcher.dispatch(createMockArtifact(), [payments]);

      expect(dispatcher.flushBatches()).toBe(1);
      expect(dispatcher.flushBatches()).toBe(0);
      expect(groups).toHaveLength(1);
    });

    test("joined groups batch as whole units", async () => {
      const billing = target(createAgentDefinition("billing"), ["Order", "Payment"], {
        join: { by: (p) => p.order_id, within_ms: 1000 },
        batch: { size: 2 },
      });
      const o1 = createMockArtifact();
      const p1 = createMockArtifact({ type: "Payment" });
      const o2 = createMockArtifact({ payload: { order_id: "o-2" } });
      const p2 = createMockArtifact({ type: "Payment", payload: { order_id: "o-2" } });

      for (const artifact of [o1, p1, o2]) await dispatcher.dispatch(artifact, [billing]);
      expect(groups).toEqual([]);
      expect(dispatcher.bufferedUnits).toBe(1);

      await dispatcher.dispatch(p2, [billing]);
      expect(groups).toHaveLength(1);
      expect(groups[0]?.inputs).toEqual([o1, p1, o2, p2]);
    });
  });
});
