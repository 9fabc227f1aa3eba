import type { Callsign } from "@pktmap/schemas";
import { parseCallsignToken } from "./callsign.js";
import { splitResponse, type ParseResult } from "./text.js";

export interface MheardEntry {
  call: Callsign;
  port: number;
  /** Time since last heard, when the node reports it. */
  age_ms?: number;
  digipeated: boolean;
}

export type MheardResult = ParseResult<"mheard", MheardEntry>;

const FIRST_TOKEN = /^\s*(\S+)/;
const PORT_FIELD = /\bPort\s+(\d+)/i;
// BPQ prints elapsed time as DD:HH:MM:SS
const ELAPSED = /\b(\d{1,3}):(\d{2}):(\d{2}):(\d{2})\b/;

function elapsedMs(m: RegExpExecArray): number {
  const field = (i: number): number => parseInt(m[i] ?? "0", 10);
  return (((field(1) * 24 + field(2)) * 60 + field(3)) * 60 + field(4)) * 1000;
}

/**
 * Parse MHEARD output for one port. Heard stations may be nodes,
 * applications or plain operators, so this is the weakest identity source.
 */
export function parseMheard(raw: string, port: number): MheardResult {
  const { lines, banner, header } = splitResponse(raw);
  const result: MheardResult = { kind: "mheard", records: [], rejected: [], skipped: 0, banner, header };
  for (const line of lines) {
    const first = FIRST_TOKEN.exec(line.text);
    if (!first) {
      result.skipped++;
      continue;
    }
    const parsed = parseCallsignToken(first[1]!);
    if (!parsed.ok) {
      if (parsed.reason === "malformed") result.skipped++;
      else result.rejected.push({ token: parsed.token, reason: parsed.reason, line: line.number });
      continue;
    }
    const portField = PORT_FIELD.exec(line.text);
    const elapsed = ELAPSED.exec(line.text);
    const entry: MheardEntry = {
      call: parsed.call,
      port: portField ? parseInt(portField[1]!, 10) : port,
      digipeated: first[1]!.endsWith("*"),
    };
    if (elapsed) entry.age_ms = elapsedMs(elapsed);
    result.records.push(entry);
  }
  return result;
}
