import type { Callsign } from "@pktmap/schemas";
import { parseCallsignToken } from "./callsign.js";
import { splitResponse, type ParseResult } from "./text.js";

export interface RouteEntry {
  port: number;
  call: Callsign;
  /** 0 = blocked by the sysop. */
  quality: number;
  node_count: number;
  locked: boolean;
  active: boolean;
}

export type RoutesResult = ParseResult<"routes", RouteEntry>;

// "> 1 N1ALF-15  200 4!"  active marker, port, call, quality, count, lock
const ROUTE_LINE = /^\s*(>)?\s*(\d+)\s+(\S+)\s+(\d+)\s+(\d+)\s*(!)?/;

function makeRouteEntry(
  port: number, call: Callsign, quality: number, nodeCount: number, locked: boolean, active: boolean,
): RouteEntry | null {
  if (port < 0 || quality < 0 || quality > 255 || nodeCount < 0) return null;
  return { port, call, quality, node_count: nodeCount, locked, active };
}

/** Parse ROUTES output: the authoritative neighbor identity source. */
export function parseRoutes(raw: string): RoutesResult {
  const { lines, banner, header } = splitResponse(raw);
  const result: RoutesResult = { kind: "routes", records: [], rejected: [], skipped: 0, banner, header };
  for (const line of lines) {
    const m = ROUTE_LINE.exec(line.text);
    if (!m) {
      result.skipped++;
      continue;
    }
    const parsed = parseCallsignToken(m[3]!);
    if (!parsed.ok) {
      if (parsed.reason === "malformed") result.skipped++;
      else result.rejected.push({ token: parsed.token, reason: parsed.reason, line: line.number });
      continue;
    }
    const entry = makeRouteEntry(
      parseInt(m[2]!, 10), parsed.call, parseInt(m[4]!, 10), parseInt(m[5]!, 10), m[6] === "!", m[1] === ">",
    );
    if (entry) result.records.push(entry);
    else result.skipped++;
  }
  return result;
}
