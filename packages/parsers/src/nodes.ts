import type { Callsign } from "@pktmap/schemas";
import { parseCallsignToken } from "./callsign.js";
import { splitResponse, type ParseResult } from "./text.js";

export interface NodeAlias {
  alias: string;
  call: Callsign;
}

export type NodesResult = ParseResult<"nodes", NodeAlias>;

const PAIR = /([A-Z0-9#_]{1,6}):([A-Z0-9]+(?:-\d+)?\*?)/gi;

/**
 * Parse NODES output into alias entries. Many of these name a service SSID
 * (mail, chat) rather than the node's own port, so the identity resolver
 * ranks them below ROUTES.
 */
export function parseNodes(raw: string): NodesResult {
  const { lines, banner, header } = splitResponse(raw);
  const result: NodesResult = { kind: "nodes", records: [], rejected: [], skipped: 0, banner, header };
  for (const line of lines) {
    let matched = false;
    for (const m of line.text.matchAll(PAIR)) {
      const parsed = parseCallsignToken(m[2]!);
      if (parsed.ok) {
        matched = true;
        result.records.push({ alias: m[1]!.toUpperCase(), call: parsed.call });
      } else if (parsed.reason !== "malformed") {
        matched = true;
        result.rejected.push({ token: parsed.token, reason: parsed.reason, line: line.number });
      }
    }
    if (!matched) result.skipped++;
  }
  return result;
}
