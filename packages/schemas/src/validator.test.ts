import { describe, it, expect } from "vitest";
import {
  validateGraphDocumentData,
  validateCrawlConfigData,
  validateJournalEventData,
  isGraphDocument,
} from "./validator.js";
import type { CrawlConfig, GraphDocument } from "./types.js";

function validDocument(): GraphDocument {
  return {
    format_version: 2,
    generated_at: "2026-01-10T12:00:00.000Z",
    nodes: {
      "N1JMHX-15": {
        call: "N1JMHX-15",
        node_type: "BPQ",
        location: { grid: "FN43QX" },
        ports: [{ number: 1, description: "144.990 MHz 1200 BAUD", frequency_mhz: 144.99, speed: 1200, link_class: "rf" }],
        aliases: { HILMA: { call: "N1JMHX-15", confidence: "advertised" } },
        applications: [{ name: "BBS", description: "Mail", call: "N1JMHX-2" }],
        commands: ["BBS", "NODES"],
        neighbors: ["N1WEC-15"],
        last_crawled: "2026-01-10T11:59:00.000Z",
        seen_by: ["local"],
      },
    },
    edges: [{
      from: "N1JMHX-15",
      to: "N1WEC-15",
      ports: [1],
      quality: 200,
      frequencies: [144.99],
      link_class: "rf",
      bidirectional: false,
      observed_by: ["N1JMHX-15"],
    }],
    meta: {
      crawl_id: "c1",
      start_node: "N1JMHX-15",
      mode: "update",
      write_mode: "merge",
      total_nodes: 1,
      total_edges: 1,
      complete: true,
      visited: ["N1JMHX-15"],
      sources: [],
    },
  };
}

function validConfig(): CrawlConfig {
  return {
    local_node: "N1WEC",
    start_node: "N1WEC",
    host: "localhost",
    port: 8010,
    max_hops: 10,
    mode: "update",
    exclude: [],
    force_ssid: {},
    merge_inputs: [],
    output_path: "nodemap.json",
    csv_path: null,
    write_mode: "merge",
    credentials: {},
    log_level: "info",
    stale_after_ms: 86_400_000,
    tie_break: "most_recent",
    command_retries: 2,
    max_attempts: 3,
    node_delay_ms: 2000,
    journal_path: null,
  };
}

describe("validateGraphDocumentData", () => {
  it("accepts a valid document", () => {
    const result = validateGraphDocumentData(validDocument());
    expect(result).toEqual({ valid: true, errors: [] });
    expect(isGraphDocument(validDocument())).toBe(true);
  });

  it("rejects an unknown format version", () => {
    const doc = { ...validDocument(), format_version: 1 };
    expect(validateGraphDocumentData(doc).valid).toBe(false);
  });

  it("rejects an SSID outside 0-15 in a node call", () => {
    const doc = validDocument();
    doc.nodes["N1JMHX-15"]!.call = "N1JMHX-27";
    const result = validateGraphDocumentData(doc);
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain("/nodes/N1JMHX-15/call");
  });

  it("accepts a null quality for heard-only edges", () => {
    const doc = validDocument();
    doc.edges[0]!.quality = null;
    expect(validateGraphDocumentData(doc).valid).toBe(true);
  });

  it("rejects a quality above 255", () => {
    const doc = validDocument();
    doc.edges[0]!.quality = 300;
    expect(validateGraphDocumentData(doc).valid).toBe(false);
  });

  it("rejects additional top-level properties", () => {
    expect(validateGraphDocumentData({ ...validDocument(), extra: true }).valid).toBe(false);
  });
});

describe("validateCrawlConfigData", () => {
  it("accepts a valid config", () => {
    expect(validateCrawlConfigData(validConfig()).valid).toBe(true);
  });

  it("rejects an unknown crawl mode", () => {
    const result = validateCrawlConfigData({ ...validConfig(), mode: "everything" });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/mode: must be equal to one of the allowed values"]);
  });

  it("rejects a forced SSID out of range", () => {
    expect(validateCrawlConfigData({ ...validConfig(), force_ssid: { N1QX: 16 } }).valid).toBe(false);
  });

  it("rejects a lower-case start node", () => {
    expect(validateCrawlConfigData({ ...validConfig(), start_node: "n1wec" }).valid).toBe(false);
  });
});

describe("validateJournalEventData", () => {
  it("accepts a well-formed event", () => {
    const event = {
      event_id: "e1",
      timestamp: new Date().toISOString(),
      crawl_id: "c1",
      type: "node.visited",
      payload: { node: "N1JMHX-15" },
      seq: 0,
    };
    expect(validateJournalEventData(event).valid).toBe(true);
  });

  it("rejects an unknown event type", () => {
    const event = { event_id: "e1", timestamp: "t", crawl_id: "c1", type: "tool.started", payload: {} };
    expect(validateJournalEventData(event).valid).toBe(false);
  });
});
