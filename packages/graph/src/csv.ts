import type { GraphDocument } from "@pktmap/schemas";
import { visibleEdges } from "./query.js";

export const CSV_HEADER = ["From", "To", "Port", "Quality", "Frequencies", "Link", "From_Grid", "To_Grid", "From_Type", "To_Type"];

function field(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export interface CsvOptions {
  /** Include sysop-blocked (quality 0) links. */
  includeBlocked?: boolean;
  /** Nodes whose links are left out, matched like the crawl's exclusion list. */
  exclude?: readonly string[];
}

/** Flatten the edge list for spreadsheets, one row per edge. */
export function exportCsv(doc: GraphDocument, opts: CsvOptions = {}): string {
  const rows = [CSV_HEADER.join(",")];
  for (const e of visibleEdges(doc, opts)) {
    const from = doc.nodes[e.from];
    const to = doc.nodes[e.to];
    rows.push([
      e.from,
      e.to,
      e.ports.join(";"),
      e.quality === null ? "" : String(e.quality),
      e.frequencies.map((f) => f.toFixed(3)).join(";"),
      e.link_class.toUpperCase(),
      from?.location.grid ?? "",
      to?.location.grid ?? "",
      from?.node_type ?? "",
      to?.node_type ?? "",
    ].map(field).join(","));
  }
  return rows.join("\n") + "\n";
}
