import { describe, it, expect } from "vitest";
import { emptyDocument } from "@pktmap/graph";
import { CrawlGraph } from "./crawl-graph.js";

describe("CrawlGraph", () => {
  it("keeps a routed quality when the same link is later only heard", () => {
    const g = new CrawlGraph();
    g.observe("N1ALF", "N1BRV", { port: 1, quality: 200, link_class: "rf", frequency_mhz: 145.05 }, "N1ALF-15");
    g.observe("N1ALF", "N1BRV", { port: 2, quality: null, link_class: "rf" }, "N1ALF-15");
    expect(g.planEdges()).toEqual([{ from: "N1ALF", to: "N1BRV", quality: 200 }]);
    expect(g.portFor("N1ALF", "N1BRV")).toBe(1);
    expect(g.portFor("N1BRV", "N1ALF")).toBeUndefined();
  });

  it("rates each port of a link on its own", () => {
    const g = new CrawlGraph();
    g.observe("N1ALF", "N1BRV", { port: 1, quality: 0, link_class: "rf" }, "N1ALF-15");
    g.observe("N1ALF", "N1BRV", { port: 2, quality: 200, link_class: "rf" }, "N1ALF-15");
    expect(g.portFor("N1ALF", "N1BRV")).toBe(2);
    expect(g.planEdges()).toEqual([{ from: "N1ALF", to: "N1BRV", quality: 200 }]);

    const reversed = new CrawlGraph();
    reversed.observe("N1ALF", "N1BRV", { port: 2, quality: 200, link_class: "rf" }, "N1ALF-15");
    reversed.observe("N1ALF", "N1BRV", { port: 1, quality: 0, link_class: "rf" }, "N1ALF-15");
    expect(reversed.portFor("N1ALF", "N1BRV")).toBe(2);
    expect(reversed.planEdges()).toEqual([{ from: "N1ALF", to: "N1BRV", quality: 200 }]);
    expect(reversed.toDelta((base) => `${base}-1`).edges.map((e) => [e.ports, e.quality])).toEqual([[[2], 200]]);
  });

  it("blocks a direction only when every rated port is blocked", () => {
    const g = new CrawlGraph();
    g.observe("N1ALF", "N1BRV", { port: 1, quality: 0, link_class: "rf" }, "N1ALF-15");
    g.observe("N1ALF", "N1BRV", { port: 3, quality: 0, link_class: "ip" }, "N1ALF-15");
    g.observe("N1ALF", "N1BRV", { port: 2, quality: null, link_class: "rf" }, "N1ALF-15");
    expect(g.planEdges()).toEqual([{ from: "N1ALF", to: "N1BRV", quality: 0 }]);
  });

  it("lets a fresh rating replace one carried over from the prior document", () => {
    const doc = emptyDocument();
    doc.edges.push({
      from: "N1ALF-15", to: "N1BRV-7", ports: [1], quality: 0, frequencies: [],
      link_class: "rf", bidirectional: true, observed_by: ["N1ALF-15"],
    });
    const g = new CrawlGraph();
    g.seed(doc);
    expect(g.planEdges()).toEqual([
      { from: "N1ALF", to: "N1BRV", quality: 0 },
      { from: "N1BRV", to: "N1ALF", quality: 0 },
    ]);
    g.observe("N1BRV", "N1ALF", { port: 1, quality: 150, link_class: "rf" }, "N1BRV-7");
    expect(g.planEdges()).toEqual([
      { from: "N1ALF", to: "N1BRV", quality: 0 },
      { from: "N1BRV", to: "N1ALF", quality: 150 },
    ]);
  });

  it("exports only this crawl's edges under canonical ids", () => {
    const g = new CrawlGraph();
    g.record("N1ALF").neighbors = ["N1BRV", "W1XYZ"];
    g.observe("N1ALF", "N1BRV", { port: 1, quality: 200, link_class: "rf" }, "N1ALF-15");
    g.observe("N1ALF", "W1XYZ", { port: 1, quality: null, link_class: "rf" }, "N1ALF-15");
    g.heard("N1BRV", Date.parse("2026-05-01T10:00:00.000Z"));
    g.record("N1BRV");
    const ids: Record<string, string> = { N1ALF: "N1ALF-15", N1BRV: "N1BRV-7" };
    const delta = g.toDelta((base) => ids[base] ?? null);

    expect(delta.nodes.map((n) => n.call)).toEqual(["N1ALF-15", "N1BRV-7"]);
    expect(delta.nodes[0]?.neighbors).toEqual(["N1BRV-7"]);
    expect(delta.nodes[1]?.last_heard).toBe("2026-05-01T10:00:00.000Z");
    expect(delta.edges).toEqual([{
      from: "N1ALF-15", to: "N1BRV-7", ports: [1], quality: 200, frequencies: [],
      link_class: "rf", bidirectional: false, observed_by: ["N1ALF-15"],
    }]);
  });

  it("does not downgrade an advertised alias", () => {
    const g = new CrawlGraph();
    g.setAlias("N1BRV", "BRAVO", "N1BRV-7", "advertised");
    g.setAlias("N1BRV", "BRAVO", "N1BRV-2", "nodes");
    expect(g.record("N1BRV").aliases).toEqual({ BRAVO: { call: "N1BRV-7", confidence: "advertised" } });
  });
});
