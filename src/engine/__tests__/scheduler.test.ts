import { beforeEach, describe, expect, test, vi } from "vitest";
import { z } from "zod";
import { defineType } from "../../artifacts/artifact-type.js";
import { InMemoryBlackboardStore } from "../../artifacts/memory.js";
import type { Artifact } from "../../artifacts/types.js";
import { resolveConfig } from "../../config.js";
import type { Logger } from "../../logger.js";
import type { BlackboardConfigInput } from "../../schemas/config.js";
import type { InvocationRecord } from "../../schemas/invocation-record.js";
import { createSubscription } from "../../subscriptions/subscription.js";
import { type AgentEngine, createAgentDefinition } from "../agent.js";
import type { MatchGroup } from "../dispatcher.js";
import { declareOutput, type MaterializedOutput, output } from "../fan-out.js";
import { Scheduler, type SchedulerOptions } from "../scheduler.js";

const Movie = defineType("Movie", z.object({ title: z.string() }));

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

const idea: Artifact = {
  id: "01IDEA",
  type: "Idea",
  payload: { topic: "space" },
  produced_by: "external",
  tags: [],
  visibility: { kind: "public" },
  created_at: 0,
};

interface AgentOpts {
  name?: string;
  engine?: AgentEngine;
  max_concurrency?: number;
  timeout_ms?: number;
}

function stored(outputs: readonly MaterializedOutput[], prefix: string): Artifact[] {
  return outputs.map((o, i) => ({
    ...idea,
    id: `${prefix}-${i}`,
    type: o.declaration.type.name,
    payload: o.payload,
    produced_by: "writer",
  }));
}

function createGroup(opts: AgentOpts = {}): MatchGroup {
  const agent = createAgentDefinition(opts.name ?? "writer");
  agent.engine = opts.engine;
  agent.max_concurrency = opts.max_concurrency;
  agent.timeout_ms = opts.timeout_ms;
  agent.outputs.push(declareOutput(agent.name, Movie));
  const subscription = createSubscription(agent.name, 0, ["Idea"]);
  agent.subscriptions.push(subscription);
  return { agent, subscription, trigger: "direct", inputs: [idea] };
}

describe("Scheduler", () => {
  let logger: ReturnType<typeof createMockLogger>;
  let published: MaterializedOutput[][];
  let completed: InvocationRecord[];

  function createScheduler(
    config: BlackboardConfigInput = {},
    publishOutputs?: SchedulerOptions["publishOutputs"],
  ): Scheduler {
    return new Scheduler({
      config: resolveConfig({ backoff: { base_ms: 0, jitter: 0 }, ...config }),
      store: new InMemoryBlackboardStore(),
      logger,
      now: () => 0,
      publishOutputs:
        publishOutputs ??
        (async (outputs, _group, claim) => {
          if (!claim()) return null;
          published.push([...outputs]);
          return stored(outputs, `out-${published.length}`);
        }),
      onComplete: (record) => completed.push(record),
    });
  }

  beforeEach(() => {
    logger = createMockLogger();
    published = [];
    completed = [];
  });

  test("publishes the engine's outputs and records OK", async () => {
    const scheduler = createScheduler();
    const id = scheduler.submit(
      createGroup({ engine: () => [output(Movie, { title: "A" }), output(Movie, { title: "B" })] }),
    );
    expect(scheduler.inFlight).toBe(1);

    await scheduler.drain();

    expect(scheduler.inFlight).toBe(0);
    expect(published.map((batch) => batch.map((o) => o.payload))).toEqual([
      [{ title: "A" }, { title: "B" }],
    ]);
    const record = scheduler.get(id);
    expect(record).toMatchObject({
      agent: "writer",
      subscription_id: "writer#0",
      trigger: "direct",
      input_ids: ["01IDEA"],
      status: "OK",
      output_ids: ["out-1-0", "out-1-1"],
      dropped_count: 0,
      retry_count: 0,
    });
    expect(record?.events.map((e) => e.type)).toEqual(["STARTED", "OK"]);
    expect(completed.map((r) => r.status)).toEqual(["OK"]);
  });

  test("an agent without an engine fails with NO_ENGINE", async () => {
    const scheduler = createScheduler();
    const id = scheduler.submit(createGroup());
    await scheduler.drain();

    expect(scheduler.get(id)).toMatchObject({
      status: "FAILED",
      error_code: "NO_ENGINE",
      error_message: "writer has no engine",
    });
    expect(logger.error).toHaveBeenCalledWith(`writer: ${id} failed (NO_ENGINE): writer has no engine`);
  });

  test("retries engine errors up to max_retries", async () => {
    const scheduler = createScheduler({ max_retries: 2 });
    let calls = 0;
    const id = scheduler.submit(
      createGroup({
        engine: (ctx) => {
          calls++;
          if (ctx.attempt === 0) throw new Error("flaky");
          return [output(Movie, { title: "second try" })];
        },
      }),
    );
    await scheduler.drain();

    expect(calls).toBe(2);
    const record = scheduler.get(id);
    expect(record?.status).toBe("OK");
    expect(record?.retry_count).toBe(1);
    expect(record?.events.map((e) => e.type)).toEqual(["STARTED", "RETRY", "OK"]);
    expect(record?.events[1]).toMatchObject({ type: "RETRY", error: "ENGINE_ERROR" });
  });

  test("gives up after the last retry", async () => {
    const scheduler = createScheduler({ max_retries: 1 });
    const id = scheduler.submit(
      createGroup({
        engine: () => {
          throw new Error("down");
        },
      }),
    );
    await scheduler.drain();

    expect(scheduler.get(id)).toMatchObject({
      status: "FAILED",
      retry_count: 1,
      error_code: "ENGINE_ERROR",
      error_message: "down",
    });
    expect(published).toEqual([]);
  });

  test("output validation failures are not retried", async () => {
    const scheduler = createScheduler({ max_retries: 3 });
    let calls = 0;
    const id = scheduler.submit(
      createGroup({
        engine: () => {
          calls++;
          return [{ type: "Poster", payload: {} }];
        },
      }),
    );
    await scheduler.drain();

    expect(calls).toBe(1);
    expect(scheduler.get(id)).toMatchObject({
      status: "FAILED",
      error_code: "UNDECLARED_OUTPUT",
      error_message: 'writer produced undeclared type "Poster"',
    });
  });

  test("times out a slow attempt and aborts its signal", async () => {
    const scheduler = createScheduler();
    let seen: AbortSignal | undefined;
    const id = scheduler.submit(
      createGroup({
        timeout_ms: 20,
        engine: async (ctx) => {
          seen = ctx.signal;
          await waitForAbort(ctx.signal);
          return [output(Movie, { title: "too late" })];
        },
      }),
    );
    await scheduler.drain();

    expect(seen?.aborted).toBe(true);
    expect(scheduler.get(id)).toMatchObject({
      status: "FAILED",
      error_code: "TIMEOUT",
      error_message: "writer timed out after 20ms",
    });
    expect(published).toEqual([]);
  });

  test("cancelAll aborts running invocations without publishing", async () => {
    const scheduler = createScheduler();
    const started = deferred();
    const id = scheduler.submit(
      createGroup({
        engine: async (ctx) => {
          started.resolve();
          await waitForAbort(ctx.signal);
          return [output(Movie, { title: "partial" })];
        },
      }),
    );
    await started.promise;

    expect(scheduler.cancelAll()).toBe(1);
    await scheduler.drain();

    expect(scheduler.get(id)).toMatchObject({ status: "CANCELLED", error_code: "CANCELLED" });
    expect(published).toEqual([]);
  });

  test("cancelAll skips invocations past their commit point", async () => {
    const storing = deferred();
    const release = deferred();
    const scheduler = createScheduler({}, async (outputs, _group, claim) => {
      if (!claim()) return null;
      storing.resolve();
      await release.promise;
      return stored(outputs, "kept");
    });
    const id = scheduler.submit(createGroup({ engine: () => [output(Movie, { title: "M" })] }));
    await storing.promise;

    expect(scheduler.cancelAll()).toBe(0);
    expect(scheduler.inFlight).toBe(1);
    release.resolve();
    await scheduler.drain();

    expect(scheduler.get(id)).toMatchObject({ status: "OK", output_ids: ["kept-0"] });
  });

  test("a refused claim records CANCELLED and publishes nothing", async () => {
    const engineDone = deferred();
    const proceed = deferred();
    const scheduler = createScheduler({}, async (outputs, _group, claim) => {
      engineDone.resolve();
      await proceed.promise;
      if (!claim()) return null;
      published.push([...outputs]);
      return [];
    });
    const id = scheduler.submit(createGroup({ engine: () => [output(Movie, { title: "M" })] }));
    await engineDone.promise;

    expect(scheduler.cancelAll()).toBe(1);
    proceed.resolve();
    await scheduler.drain();

    expect(scheduler.get(id)).toMatchObject({
      status: "CANCELLED",
      error_message: "cancelled before publish",
    });
    expect(published).toEqual([]);
  });

  test("global max_concurrency holds later invocations back", async () => {
    const scheduler = createScheduler({ max_concurrency: 1 });
    const gate = deferred();
    const started: string[] = [];
    const engine: AgentEngine = async (ctx) => {
      started.push(ctx.agent);
      await gate.promise;
      return [];
    };
    scheduler.submit(createGroup({ name: "a", engine }));
    const second = scheduler.submit(createGroup({ name: "b", engine }));

    await vi.waitFor(() => expect(started).toEqual(["a"]));
    expect(scheduler.inFlight).toBe(2);
    expect(scheduler.get(second)?.status).toBe("PENDING");

    gate.resolve();
    await scheduler.drain();
    expect(started).toEqual(["a", "b"]);
  });

  test("per-agent limits apply on top of the global one", async () => {
    const scheduler = createScheduler({ max_concurrency: 8 });
    const gate = deferred();
    let running = 0;
    let peak = 0;
    const group = createGroup({
      max_concurrency: 2,
      engine: async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
        return [];
      },
    });
    for (let i = 0; i < 5; i++) scheduler.submit(group);

    await vi.waitFor(() => expect(running).toBe(2));
    gate.resolve();
    await scheduler.drain();

    expect(peak).toBe(2);
    expect(scheduler.invocations({ status: "OK" })).toHaveLength(5);
  });

  test("a saturated agent's queued work does not hold global slots", async () => {
    const scheduler = createScheduler({ max_concurrency: 2 });
    const gate = deferred();
    const started: string[] = [];
    const slow: AgentEngine = async (ctx) => {
      started.push(ctx.agent);
      await gate.promise;
      return [];
    };
    for (let i = 0; i < 3; i++) {
      scheduler.submit(createGroup({ name: "slow", max_concurrency: 1, engine: slow }));
    }
    scheduler.submit(
      createGroup({
        name: "fast",
        engine: (ctx) => {
          started.push(ctx.agent);
          return [];
        },
      }),
    );

    await vi.waitFor(() =>
      expect(scheduler.invocations({ agent: "fast", status: "OK" })).toHaveLength(1),
    );
    expect([...started].sort()).toEqual(["fast", "slow"]);
    expect(scheduler.invocations({ agent: "slow", status: "PENDING" })).toHaveLength(2);

    gate.resolve();
    await scheduler.drain();
    expect([...started].sort()).toEqual(["fast", "slow", "slow", "slow"]);
  });

  test("invocations waiting for a permit can be cancelled", async () => {
    const scheduler = createScheduler({ max_concurrency: 1 });
    const started = deferred();
    const engine: AgentEngine = async (ctx) => {
      started.resolve();
      await waitForAbort(ctx.signal);
      return [];
    };
    scheduler.submit(createGroup({ name: "a", engine }));
    const waiting = scheduler.submit(createGroup({ name: "b", engine }));
    await started.promise;

    expect(scheduler.cancelAll()).toBe(2);
    await scheduler.drain();

    const record = scheduler.get(waiting);
    expect(record?.status).toBe("CANCELLED");
    expect(record?.events.map((e) => e.type)).toEqual(["CANCELLED"]);
  });

  test("filters the invocation list", async () => {
    const scheduler = createScheduler();
    scheduler.submit(createGroup({ name: "a", engine: () => [] }));
    scheduler.submit(createGroup({ name: "b" }));
    await scheduler.drain();

    expect(scheduler.invocations({ agent: "a" }).map((r) => r.status)).toEqual(["OK"]);
    expect(scheduler.invocations({ status: "FAILED" }).map((r) => r.agent)).toEqual(["b"]);
  });
});
