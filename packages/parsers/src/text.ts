import type { Callsign } from "@pktmap/schemas";
import { parseCallsignToken } from "./callsign.js";

export interface Banner {
  alias: string;
  call: Callsign;
}

export interface RejectedEntry {
  token: string;
  reason: "missing_ssid" | "ssid_out_of_range";
  line: number;
}

/**
 * Result of parsing one command's output. `skipped` counts lines that
 * carried content but could not be read (garbled or truncated); `rejected`
 * lists well-formed entries that can never be crawl targets.
 */
export interface ParseResult<K extends string, T> {
  kind: K;
  records: T[];
  rejected: RejectedEntry[];
  skipped: number;
  banner: Banner | null;
  /** True when a banner or section header was recognised. */
  header: boolean;
}

const BANNER = /^([A-Z0-9#_]{1,6}):([A-Z0-9]+-\d{1,2})\}\s*/i;
const SECTION_HEADER = /^(routes|nodes|ports|heard list|mheard|links|users)\b/i;
const RULE = /^[-=_*\s]+$/;

export interface Line {
  text: string;
  number: number;
}

/**
 * Normalise line endings, strip the `ALIAS:CALL-SSID}` banner a BPQ node
 * prefixes to every response, and drop blank lines and horizontal rules.
 */
export function splitResponse(raw: string): { lines: Line[]; banner: Banner | null; header: boolean } {
  let banner: Banner | null = null;
  let header = false;
  const lines: Line[] = [];
  const rawLines = raw.replace(/\r\n?/g, "\n").split("\n");
  for (let i = 0; i < rawLines.length; i++) {
    let text = rawLines[i]!.trimEnd();
    const b = BANNER.exec(text.trimStart());
    if (b) {
      const parsed = parseCallsignToken(b[2]!);
      if (parsed.ok && banner === null) banner = { alias: b[1]!.toUpperCase(), call: parsed.call };
      text = text.trimStart().slice(b[0].length);
      header = true;
    }
    if (text.trim().length === 0 || RULE.test(text)) continue;
    if (SECTION_HEADER.test(text.trim())) {
      header = true;
      continue;
    }
    lines.push({ text, number: i + 1 });
  }
  return { lines, banner, header };
}

/** Remove a leading `ALIAS:CALL-SSID}` banner from one line. */
export function stripBanner(line: string): string {
  const trimmed = line.trimStart();
  const b = BANNER.exec(trimmed);
  return b ? trimmed.slice(b[0].length) : line;
}

/**
 * A response is plausible when it was recognisably produced by the command
 * and garbled lines do not outnumber the readable ones.
 */
export function isPlausible<K extends string, T>(result: ParseResult<K, T>): boolean {
  const readable = result.records.length + result.rejected.length;
  if (!result.header && readable === 0) return false;
  return result.skipped <= Math.max(2, readable);
}
