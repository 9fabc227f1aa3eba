import { describe, it, expect } from "vitest";
import { buildAdjacency, type PlanEdge } from "./bfs.js";
import { planPaths } from "./planner.js";

const diamond: PlanEdge[] = [
  { from: "L", to: "A", quality: 200 },
  { from: "L", to: "B", quality: 200 },
  { from: "A", to: "C", quality: 200 },
  { from: "B", to: "C", quality: 150 },
  { from: "C", to: "D", quality: 200 },
  { from: "A", to: "D", quality: 0 },
];

describe("planPaths", () => {
  it("offers every minimal parent, ordered by parent id", () => {
    const adj = buildAdjacency(diamond);
    expect(planPaths(adj, "L", "C")).toEqual([
      { nodes: ["L", "A", "C"], hops: 2, via: "A" },
      { nodes: ["L", "B", "C"], hops: 2, via: "B" },
    ]);
  });

  it("never routes over a quality-0 link", () => {
    const adj = buildAdjacency(diamond);
    const paths = planPaths(adj, "L", "D");
    expect(paths).toEqual([{ nodes: ["L", "A", "C", "D"], hops: 3, via: "C" }]);
    for (const p of paths) {
      expect(p.nodes.join(">")).not.toContain("A>D");
    }
  });

  it("includes near-minimal alternates within the slack", () => {
    const adj = buildAdjacency([
      { from: "L", to: "A", quality: 100 },
      { from: "A", to: "T", quality: 100 },
      { from: "L", to: "B", quality: 100 },
      { from: "B", to: "C", quality: 100 },
      { from: "C", to: "T", quality: 100 },
    ]);
    expect(planPaths(adj, "L", "T").map((p) => p.nodes)).toEqual([
      ["L", "A", "T"],
      ["L", "B", "C", "T"],
    ]);
    expect(planPaths(adj, "L", "T", { slack: 0 }).map((p) => p.nodes)).toEqual([["L", "A", "T"]]);
  });

  it("caps the number of candidates", () => {
    const adj = buildAdjacency([
      { from: "L", to: "P1", quality: 1 },
      { from: "L", to: "P2", quality: 1 },
      { from: "L", to: "P3", quality: 1 },
      { from: "P1", to: "T", quality: 1 },
      { from: "P2", to: "T", quality: 1 },
      { from: "P3", to: "T", quality: 1 },
    ]);
    expect(planPaths(adj, "L", "T", { maxCandidates: 2 }).map((p) => p.via)).toEqual(["P1", "P2"]);
  });

  it("is repeatable whatever order the edges arrive in", () => {
    const forward = planPaths(buildAdjacency(diamond), "L", "D");
    const reversed = planPaths(buildAdjacency([...diamond].reverse()), "L", "D");
    expect(reversed).toEqual(forward);
  });

  it("uses heard-only links from the local node", () => {
    const heard: PlanEdge[] = [{ from: "L", to: "H", quality: null }, { from: "A", to: "X", quality: null }];
    expect(planPaths(buildAdjacency(heard), "L", "H")).toEqual([]);
    expect(planPaths(buildAdjacency(heard, { allowUnratedFrom: "L" }), "L", "H")).toEqual([
      { nodes: ["L", "H"], hops: 1, via: "L" },
    ]);
  });

  it("returns nothing for an unknown target and a zero-hop path for the start", () => {
    const adj = buildAdjacency(diamond);
    expect(planPaths(adj, "L", "Q")).toEqual([]);
    expect(planPaths(adj, "L", "L")).toEqual([{ nodes: ["L"], hops: 0, via: "L" }]);
  });
});
