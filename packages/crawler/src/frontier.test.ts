import { describe, it, expect } from "vitest";
import { Frontier } from "./frontier.js";

describe("Frontier", () => {
  it("picks the nearest node, then the earliest enqueued", () => {
    const f = new Frontier();
    f.add("C");
    f.add("B");
    f.add("A");
    const distance = new Map([["A", 2], ["B", 1], ["C", 1]]);
    expect(f.next((b) => distance.get(b), 10)?.base).toBe("C");
  });

  it("passes over parked entries and nodes beyond the hop limit", () => {
    const f = new Frontier();
    const near = f.add("NEAR");
    f.add("FAR");
    f.add("NOWHERE");
    const distance = new Map([["NEAR", 1], ["FAR", 3]]);
    if (!near) throw new Error("expected entry");
    f.park(near);
    expect(f.next((b) => distance.get(b), 2)).toBeNull();
    f.unparkAll();
    expect(f.next((b) => distance.get(b), 2)?.base).toBe("NEAR");
  });

  it("tracks state transitions", () => {
    const f = new Frontier();
    const entry = f.add("A");
    expect(f.add("A")).toBeNull();
    if (!entry) throw new Error("expected entry");
    f.attempting(entry);
    expect(f.state("A")).toBe("attempting");
    f.release(entry);
    expect(f.pending().map((e) => e.base)).toEqual(["A"]);
    f.visited(entry);
    expect(f.state("A")).toBe("visited");
    expect(f.state("B")).toBe("unknown");
    f.adoptVisited("B");
    expect(f.state("B")).toBe("visited");
    expect(f.pending()).toEqual([]);
  });
});
