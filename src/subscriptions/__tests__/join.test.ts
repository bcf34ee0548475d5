import { describe, expect, test } from "vitest";
import type { Artifact } from "../../artifacts/types.js";
import { JoinCorrelator } from "../join.js";

function createMockArtifact(id: string, type: string): Artifact {
  return {
    id,
    type,
    payload: { patient_id: "p1" },
    produced_by: "external",
    tags: [],
    visibility: { kind: "public" },
    created_at: 0,
  };
}

const WINDOW = 5 * 60_000;

describe("JoinCorrelator", () => {
  test("emits a group once every type has arrived, in type order", () => {
    const join = new JoinCorrelator(["XRay", "Lab"], WINDOW);
    const lab = createMockArtifact("L1", "Lab");
    const xray = createMockArtifact("X1", "XRay");

    expect(join.offer(lab, "p1", 0)).toEqual({ expired: [] });
    const result = join.offer(xray, "p1", 60_000);
    expect(result.group?.map((a) => a.id)).toEqual(["X1", "L1"]);
    expect(join.pendingCount).toBe(0);
  });

  test("different keys never join", () => {
    const join = new JoinCorrelator(["XRay", "Lab"], WINDOW);
    join.offer(createMockArtifact("X1", "XRay"), "p1", 0);
    const result = join.offer(createMockArtifact("L1", "Lab"), "p2", 0);
    expect(result.group).toBeUndefined();
    expect(join.pendingCount).toBe(2);
  });

  test("match at exactly the window edge", () => {
    const join = new JoinCorrelator(["XRay", "Lab"], WINDOW);
    join.offer(createMockArtifact("X1", "XRay"), "p1", 0);
    const result = join.offer(createMockArtifact("L1", "Lab"), "p1", WINDOW);
    expect(result.group?.map((a) => a.id)).toEqual(["X1", "L1"]);
  });

  test("partner past the window expires the old entry and waits fresh", () => {
    const join = new JoinCorrelator(["XRay", "Lab"], WINDOW);
    join.offer(createMockArtifact("X1", "XRay"), "p1", 0);
    const result = join.offer(createMockArtifact("L1", "Lab"), "p1", WINDOW + 1);
    expect(result.group).toBeUndefined();
    expect(result.expired.map((a) => a.id)).toEqual(["X1"]);
    expect(join.pendingCount).toBe(1);

    const next = join.offer(createMockArtifact("X2", "XRay"), "p1", WINDOW + 2);
    expect(next.group?.map((a) => a.id)).toEqual(["X2", "L1"]);
  });

  test("earliest entry per type wins, later ones stay pending", () => {
    const join = new JoinCorrelator(["XRay", "Lab"], WINDOW);
    join.offer(createMockArtifact("X1", "XRay"), "p1", 0);
    join.offer(createMockArtifact("X2", "XRay"), "p1", 10);
    const result = join.offer(createMockArtifact("L1", "Lab"), "p1", 20);
    expect(result.group?.map((a) => a.id)).toEqual(["X1", "L1"]);
    expect(join.pendingCount).toBe(1);
  });

  test("sweep drops expired entries across keys", () => {
    const join = new JoinCorrelator(["XRay", "Lab"], WINDOW);
    join.offer(createMockArtifact("X1", "XRay"), "p1", 0);
    join.offer(createMockArtifact("L2", "Lab"), "p2", 100);
    expect(join.sweep(WINDOW + 50).map((a) => a.id)).toEqual(["X1"]);
    expect(join.pendingCount).toBe(1);
  });

  test("three-way join", () => {
    const join = new JoinCorrelator(["A", "B", "C"], WINDOW);
    join.offer(createMockArtifact("c", "C"), "k", 0);
    join.offer(createMockArtifact("a", "A"), "k", 1);
    const result = join.offer(createMockArtifact("b", "B"), "k", 2);
    expect(result.group?.map((a) => a.id)).toEqual(["a", "b", "c"]);
  });
});
