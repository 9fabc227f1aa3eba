import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PktmapError } from "@pktmap/schemas";
import { GraphStore, partialPath } from "./store.js";
import { emptyDocument, emptyNode } from "./document.js";

describe("GraphStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pktmap-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns null when no document exists yet", async () => {
    expect(await new GraphStore(join(dir, "nodemap.json")).load()).toBeNull();
  });

  it("round-trips a document and leaves no temporary file", async () => {
    const store = new GraphStore(join(dir, "maps", "nodemap.json"));
    const doc = emptyDocument({ crawl_id: "run-1", start_node: "N1WEC-15", total_nodes: 1 }, "2026-03-04T05:06:07.000Z");
    doc.nodes["N1WEC-15"] = emptyNode("N1WEC-15");
    await store.save(doc);
    expect(await store.load()).toEqual(doc);
    expect(await readdir(join(dir, "maps"))).toEqual(["nodemap.json"]);
  });

  it("rejects a file that is not JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ nodes: ", "utf-8");
    await expect(new GraphStore(path).load()).rejects.toMatchObject({ code: "invalid_document" });
  });

  it("rejects a document that fails the schema", async () => {
    const path = join(dir, "old.json");
    await writeFile(path, JSON.stringify({ format_version: 1, nodes: {}, edges: [] }), "utf-8");
    await expect(new GraphStore(path).load()).rejects.toBeInstanceOf(PktmapError);
  });

  it("refuses to write an invalid document", async () => {
    const store = new GraphStore(join(dir, "nodemap.json"));
    const doc = emptyDocument();
    doc.nodes["bad id"] = emptyNode("bad id");
    await expect(store.save(doc)).rejects.toMatchObject({ code: "invalid_document" });
    expect(await readdir(dir)).toEqual([]);
  });
});

describe("partialPath", () => {
  it("names the partial file after the start node", () => {
    expect(partialPath("maps/nodemap.json", "n1wec-15")).toBe(join("maps", "nodemap_partial_N1WEC-15.json"));
    expect(partialPath("nodemap", "N1WEC-15")).toBe("nodemap_partial_N1WEC-15.json");
  });
});
