import type { Callsign } from "@pktmap/schemas";

/** Amateur callsign without SSID: prefix, one digit, 1–4 letter suffix. */
const BASE_PATTERN = /^(?:[A-Z]{1,2}|[0-9][A-Z]|[A-Z][0-9])[0-9][A-Z]{1,4}$/;
const TOKEN_PATTERN = /^([A-Z0-9]+)(?:-(\d{1,2}))?$/;

export const MAX_SSID = 15;

export type CallsignRejection = "malformed" | "missing_ssid" | "ssid_out_of_range";

export type CallsignParse =
  | { ok: true; call: Callsign }
  | { ok: false; reason: CallsignRejection; token: string };

export function isValidBase(base: string): boolean {
  return BASE_PATTERN.test(base.toUpperCase());
}

export function isValidSsid(ssid: number): boolean {
  return Number.isInteger(ssid) && ssid >= 0 && ssid <= MAX_SSID;
}

/**
 * Parse a `CALL-SSID` token as a crawl target. A trailing `*` (heard via a
 * digipeater) is ignored. A bare base callsign is rejected: without an SSID
 * there is nothing to connect to.
 */
export function parseCallsignToken(raw: string): CallsignParse {
  const token = raw.trim().toUpperCase().replace(/\*$/, "");
  const m = TOKEN_PATTERN.exec(token);
  if (!m || !isValidBase(m[1]!)) return { ok: false, reason: "malformed", token };
  if (m[2] === undefined) return { ok: false, reason: "missing_ssid", token };
  const ssid = parseInt(m[2], 10);
  if (!isValidSsid(ssid)) return { ok: false, reason: "ssid_out_of_range", token };
  return { ok: true, call: { base: m[1]!, ssid } };
}

export function formatCallsign(call: Callsign): string {
  return `${call.base}-${call.ssid}`;
}

/** Base callsign of a canonical id (`N1JMHX-15` → `N1JMHX`). */
export function baseOf(id: string): string {
  const dash = id.indexOf("-");
  return (dash === -1 ? id : id.slice(0, dash)).toUpperCase();
}

/** Parse a canonical id that may omit the SSID (the local node). */
export function parseCanonicalId(id: string): Callsign | null {
  const m = TOKEN_PATTERN.exec(id.trim().toUpperCase());
  if (!m || !isValidBase(m[1]!)) return null;
  const ssid = m[2] === undefined ? 0 : parseInt(m[2], 10);
  return isValidSsid(ssid) ? { base: m[1]!, ssid } : null;
}
