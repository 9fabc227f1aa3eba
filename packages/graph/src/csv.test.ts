import { describe, it, expect } from "vitest";
import { emptyDocument, emptyNode } from "./document.js";
import { exportCsv } from "./csv.js";

describe("exportCsv", () => {
  const doc = emptyDocument();
  doc.nodes["A1AA-1"] = { ...emptyNode("A1AA-1"), node_type: "BPQ", location: { grid: "FN43QX" } };
  doc.nodes["B1BB-1"] = emptyNode("B1BB-1");
  doc.edges = [
    {
      from: "A1AA-1", to: "B1BB-1", ports: [1, 3], quality: 200, frequencies: [145.05, 439.1],
      link_class: "rf", bidirectional: true, observed_by: ["A1AA-1"],
    },
    {
      from: "A1AA-1", to: "C1CC-1", ports: [2], quality: 0, frequencies: [],
      link_class: "ip", bidirectional: false, observed_by: ["A1AA-1"],
    },
    {
      from: "B1BB-1", to: "C1CC-1", ports: [], quality: null, frequencies: [],
      link_class: "hf", bidirectional: false, observed_by: ["B1BB-1"],
    },
  ];

  it("writes one row per visible edge", () => {
    expect(exportCsv(doc)).toBe([
      "From,To,Port,Quality,Frequencies,Link,From_Grid,To_Grid,From_Type,To_Type",
      "A1AA-1,B1BB-1,1;3,200,145.050;439.100,RF,FN43QX,,BPQ,Unknown",
      "B1BB-1,C1CC-1,,,,HF,,,Unknown,",
      "",
    ].join("\n"));
  });

  it("includes blocked links on request", () => {
    const lines = exportCsv(doc, { includeBlocked: true }).trimEnd().split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[2]).toBe("A1AA-1,C1CC-1,2,0,,IP,FN43QX,,BPQ,");
  });

  it("leaves out links touching an excluded node", () => {
    expect(exportCsv(doc, { exclude: ["C1CC"] })).toBe([
      "From,To,Port,Quality,Frequencies,Link,From_Grid,To_Grid,From_Type,To_Type",
      "A1AA-1,B1BB-1,1;3,200,145.050;439.100,RF,FN43QX,,BPQ,Unknown",
      "",
    ].join("\n"));
  });
});
