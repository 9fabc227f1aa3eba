import { describe, it, expect } from "vitest";
import { buildAdjacency, hopDistance, shortestPath, type PlanEdge } from "./bfs.js";

const edges: PlanEdge[] = [
  { from: "L", to: "A", quality: 200 },
  { from: "L", to: "B", quality: 200 },
  { from: "A", to: "C", quality: 200 },
  { from: "B", to: "C", quality: 150 },
  { from: "C", to: "D", quality: 200 },
  { from: "A", to: "D", quality: 0 },
  { from: "B", to: "E", quality: null },
  { from: "L", to: "F", quality: null },
];

describe("buildAdjacency", () => {
  it("drops blocked links and heard-only links away from the local node", () => {
    const adj = buildAdjacency(edges, { allowUnratedFrom: "L" });
    expect(Object.fromEntries(adj)).toEqual({
      L: ["A", "B", "F"],
      A: ["C"],
      B: ["C"],
      C: ["D"],
    });
  });

  it("follows bidirectional links both ways", () => {
    const adj = buildAdjacency([{ from: "X", to: "Y", quality: 100, bidirectional: true }]);
    expect(Object.fromEntries(adj)).toEqual({ X: ["Y"], Y: ["X"] });
  });

  it("lets a zero quality from any source block the direction", () => {
    const adj = buildAdjacency([
      { from: "A", to: "B", quality: 0, bidirectional: true },
      { from: "B", to: "A", quality: 200 },
    ]);
    expect(adj.size).toBe(0);
  });
});

describe("hopDistance", () => {
  it("counts hops from the start node", () => {
    const adj = buildAdjacency(edges, { allowUnratedFrom: "L" });
    expect(Object.fromEntries(hopDistance(adj, "L"))).toEqual({ L: 0, A: 1, B: 1, F: 1, C: 2, D: 3 });
  });
});

describe("shortestPath", () => {
  const adj = buildAdjacency(edges, { allowUnratedFrom: "L" });

  it("returns [start] when start equals target", () => {
    expect(shortestPath(adj, "L", "L")).toEqual(["L"]);
  });

  it("avoids a blocked shortcut", () => {
    expect(shortestPath(adj, "L", "D")).toEqual(["L", "A", "C", "D"]);
  });

  it("returns null for unreachable targets", () => {
    expect(shortestPath(adj, "L", "E")).toBeNull();
    expect(shortestPath(adj, "L", "Z")).toBeNull();
  });
});
