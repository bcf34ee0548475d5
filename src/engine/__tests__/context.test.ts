import { describe, expect, test } from "vitest";
import { z } from "zod";
import { defineType } from "../../artifacts/artifact-type.js";
import { InMemoryBlackboardStore } from "../../artifacts/memory.js";
import type { Artifact } from "../../artifacts/types.js";
import { createEvaluationContext } from "../context.js";

const Note = defineType("Note", z.object({ text: z.string() }));
const Vote = defineType("Vote", z.object({ up: z.boolean() }));

function createMockArtifact(overrides: Partial<Artifact> = {}): Artifact {
  return {
    id: "N1",
    type: "Note",
    payload: { text: "hello" },
    produced_by: "external",
    tags: [],
    visibility: { kind: "public" },
    created_at: 0,
    ...overrides,
  };
}

function contextFor(inputs: Artifact[], store = new InMemoryBlackboardStore()) {
  return createEvaluationContext({
    identity: { name: "reader", labels: ["staff"] },
    invocation_id: "inv-1",
    subscription_id: "reader#0",
    trigger: "batch",
    attempt: 0,
    inputs,
    outputs: ["Summary"],
    signal: new AbortController().signal,
    store,
  });
}

describe("createEvaluationContext", () => {
  test("exposes the invocation's inputs by type", () => {
    const ctx = contextFor([
      createMockArtifact({ id: "N1", payload: { text: "a" } }),
      createMockArtifact({ id: "V1", type: "Vote", payload: { up: true } }),
      createMockArtifact({ id: "N2", payload: { text: "b" } }),
    ]);

    expect(ctx.all(Note)).toEqual([{ text: "a" }, { text: "b" }]);
    expect(ctx.first(Vote)).toEqual({ up: true });
    expect(ctx.is_batch).toBe(true);
    expect(ctx.outputs).toEqual(["Summary"]);
  });

  test("correlation_id comes from the first input that has one", () => {
    const ctx = contextFor([
      createMockArtifact({ id: "N1" }),
      createMockArtifact({ id: "N2", correlation_id: "c-7" }),
    ]);
    expect(ctx.correlation_id).toBe("c-7");
  });

  test("history only returns artifacts the agent may see", async () => {
    const store = new InMemoryBlackboardStore();
    await store.publish(createMockArtifact({ id: "N1", payload: { text: "public" } }));
    await store.publish(
      createMockArtifact({
        id: "N2",
        payload: { text: "secret" },
        visibility: { kind: "private", agents: ["someone-else"] },
      }),
    );
    await store.publish(
      createMockArtifact({
        id: "N3",
        payload: { text: "staff only" },
        visibility: { kind: "labelled", required_labels: ["staff"] },
      }),
    );

    const history = await contextFor([], store).history(Note);
    expect(history.map((a) => a.payload.text)).toEqual(["public", "staff only"]);
  });

  test("history limit keeps the most recent entries", async () => {
    const store = new InMemoryBlackboardStore();
    for (const id of ["N1", "N2", "N3"]) {
      await store.publish(createMockArtifact({ id, payload: { text: id } }));
    }
    const ctx = contextFor([], store);

    expect((await ctx.history(Note, { limit: 2 })).map((a) => a.id)).toEqual(["N2", "N3"]);
    expect(await ctx.history(Note, { limit: 0 })).toEqual([]);
  });

  test("payloads are returned as stored, not parsed again", async () => {
    const Tally = defineType("Tally", z.number().transform((n) => n + 1));
    const store = new InMemoryBlackboardStore();
    await store.publish(createMockArtifact({ id: "T1", type: "Tally", payload: 2 }));
    const ctx = contextFor([createMockArtifact({ id: "T2", type: "Tally", payload: 5 })], store);

    expect(ctx.all(Tally)).toEqual([5]);
    expect(ctx.first(Tally)).toBe(5);
    expect((await ctx.history(Tally)).map((a) => a.payload)).toEqual([2]);
  });
});
