import type { EdgeRecord, GraphDocument, GraphMeta, NodeRecord } from "@pktmap/schemas";

export function emptyNode(call: string): NodeRecord {
  return {
    call,
    node_type: "Unknown",
    location: {},
    ports: [],
    aliases: {},
    applications: [],
    commands: [],
    neighbors: [],
    seen_by: [],
  };
}

export function emptyDocument(meta: Partial<GraphMeta> = {}, generatedAt = new Date().toISOString()): GraphDocument {
  return {
    format_version: 2,
    generated_at: generatedAt,
    nodes: {},
    edges: [],
    meta: {
      crawl_id: "",
      start_node: null,
      mode: "update",
      write_mode: "merge",
      total_nodes: 0,
      total_edges: 0,
      complete: true,
      visited: [],
      sources: [],
      ...meta,
    },
  };
}

/** Recompute the totals in `meta` from the document body. */
export function withTotals(doc: GraphDocument): GraphDocument {
  return {
    ...doc,
    meta: { ...doc.meta, total_nodes: Object.keys(doc.nodes).length, total_edges: doc.edges.length },
  };
}

/**
 * Key shared by every record of one physical link: the unordered endpoint
 * pair and the link class.
 */
export function linkKey(edge: Pick<EdgeRecord, "from" | "to" | "link_class">): string {
  const [a, b] = edge.from < edge.to ? [edge.from, edge.to] : [edge.to, edge.from];
  return `${a}|${b}|${edge.link_class}`;
}

export function sortedUnion<T extends string | number>(...lists: ReadonlyArray<readonly T[]>): T[] {
  const set = new Set<T>();
  for (const list of lists) for (const item of list) set.add(item);
  return [...set].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function compareEdges(a: EdgeRecord, b: EdgeRecord): number {
  return a.from.localeCompare(b.from) || a.to.localeCompare(b.to) || a.link_class.localeCompare(b.link_class);
}
