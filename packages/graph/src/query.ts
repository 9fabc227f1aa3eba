import type { EdgeRecord, GraphDocument, LinkClass, NodeRecord, NodeType } from "@pktmap/schemas";
import { baseOf } from "@pktmap/parsers";

/**
 * Exclusion-list match. An entry with an SSID matches that identity only; a
 * bare base callsign matches every SSID under it.
 */
export function isExcluded(id: string, exclude: readonly string[]): boolean {
  const upper = id.toUpperCase();
  const base = baseOf(upper);
  return exclude.some((entry) => {
    const e = entry.trim().toUpperCase();
    return e.includes("-") ? e === upper : e === base;
  });
}

export interface NodeFilter {
  /** Case-insensitive substring of the callsign or one of its aliases. */
  pattern?: string;
  type?: NodeType;
  linkClass?: LinkClass;
  exclude?: readonly string[];
}

export function queryNodes(doc: GraphDocument, filter: NodeFilter = {}): NodeRecord[] {
  const pattern = filter.pattern?.toUpperCase();
  return Object.values(doc.nodes)
    .filter((n) => !isExcluded(n.call, filter.exclude ?? []))
    .filter((n) => !filter.type || n.node_type === filter.type)
    .filter((n) => !filter.linkClass || n.ports.some((p) => p.link_class === filter.linkClass))
    .filter((n) => !pattern || n.call.includes(pattern) || Object.keys(n.aliases).some((a) => a.includes(pattern)))
    .sort((a, b) => a.call.localeCompare(b.call));
}

export interface EdgeFilter {
  includeBlocked?: boolean;
  exclude?: readonly string[];
}

/** Edges for display: blocked links hidden unless asked for, excluded nodes dropped. */
export function visibleEdges(doc: GraphDocument, filter: EdgeFilter = {}): EdgeRecord[] {
  const exclude = filter.exclude ?? [];
  return doc.edges.filter(
    (e) => (filter.includeBlocked || e.quality !== 0) && !isExcluded(e.from, exclude) && !isExcluded(e.to, exclude),
  );
}

function table(header: string[], rows: string[][]): string[] {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  return [header, ...rows].map((cells) => cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join("  ").trimEnd());
}

/** Plain-text node table with a totals line. */
export function formatSummaryTable(doc: GraphDocument, filter: NodeFilter = {}): string {
  const nodes = queryNodes(doc, filter);
  const edges = visibleEdges(doc, { exclude: filter.exclude });
  const rows = nodes.map((n) => [
    n.call,
    n.node_type,
    n.location.grid ?? "-",
    n.ports.map((p) => String(p.number)).join(",") || "-",
    String(n.neighbors.length),
    n.last_crawled?.slice(0, 16).replace("T", " ") ?? "never",
  ]);
  const lines = table(["Node", "Type", "Grid", "Ports", "Nbrs", "Crawled"], rows);
  const hidden = doc.edges.length - visibleEdges(doc, { includeBlocked: true, exclude: filter.exclude }).length;
  const blocked = doc.edges.filter((e) => e.quality === 0).length;
  lines.push("");
  lines.push(`${nodes.length} nodes, ${edges.length} links (${blocked} blocked, ${hidden} excluded)`);
  return lines.join("\n");
}
