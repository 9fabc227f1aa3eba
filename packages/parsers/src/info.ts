import type { Application, NodeLocation, NodeType } from "@pktmap/schemas";
import { parseCallsignToken } from "./callsign.js";
import { splitResponse } from "./text.js";

export interface InfoResult {
  kind: "info";
  location: NodeLocation;
  applications: Application[];
  text: string;
}

const GRID = /\b([A-R]{2}\d{2}[A-X]{2})\b/i;
const HEMISPHERE_PAIR = /(\d{1,2}(?:\.\d+)?)\s*°?\s*([NS])\b[\s,/]*(\d{1,3}(?:\.\d+)?)\s*°?\s*([EW])\b/i;
const DECIMAL_PAIR = /(-?\d{1,2}\.\d{2,})\s*,\s*(-?\d{1,3}\.\d{2,})/;
const CITY_STATE = /\b([A-Z][a-z]+(?: [A-Z][a-z]+)*),\s*([A-Z]{2})\b/;

export function parseLocation(text: string): NodeLocation {
  const location: NodeLocation = {};
  const grid = GRID.exec(text);
  if (grid) location.grid = grid[1]!.toUpperCase();

  const hemi = HEMISPHERE_PAIR.exec(text);
  const dec = DECIMAL_PAIR.exec(text);
  let lat: number | undefined;
  let lon: number | undefined;
  if (hemi) {
    lat = parseFloat(hemi[1]!) * (hemi[2]!.toUpperCase() === "S" ? -1 : 1);
    lon = parseFloat(hemi[3]!) * (hemi[4]!.toUpperCase() === "W" ? -1 : 1);
  } else if (dec) {
    lat = parseFloat(dec[1]!);
    lon = parseFloat(dec[2]!);
  }
  if (lat !== undefined && lon !== undefined && Math.abs(lat) <= 90 && Math.abs(lon) <= 180) {
    location.lat = lat;
    location.lon = lon;
  }

  const cityState = CITY_STATE.exec(text);
  if (cityState) {
    location.city = cityState[1]!;
    location.state = cityState[2]!;
  }
  return location;
}

/**
 * Applications appear in INFO under an "Applications" heading underlined
 * with dashes, one per line: `BBS   Inter-node Mail   N1WEC-2`.
 */
export function parseApplications(text: string): Application[] {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const apps: Application[] = [];
  let inSection = false;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim();
    if (!inSection) {
      inSection = /application/i.test(line) && /^-{3,}/.test((lines[i + 1] ?? "").trim());
      if (inSection) i++;
      continue;
    }
    if (line.length === 0 || /^-{3,}/.test(line)) break;
    const parts = line.split(/\s+/);
    const name = parts[0]!;
    const last = parts.length > 1 ? parts[parts.length - 1]! : "";
    const call = parseCallsignToken(last);
    if (call.ok) {
      apps.push({ name, description: parts.slice(1, -1).join(" "), call: `${call.call.base}-${call.call.ssid}` });
    } else {
      apps.push({ name, description: parts.slice(1).join(" ") });
    }
  }
  return apps;
}

export function parseInfo(raw: string): InfoResult {
  const text = splitResponse(raw).lines.map((l) => l.text).join("\n");
  return { kind: "info", location: parseLocation(text), applications: parseApplications(raw), text: text.trim() };
}

/** Identify the node software family from INFO text and the prompt style. */
export function detectNodeType(info: string, hasBanner: boolean): NodeType {
  const upper = info.toUpperCase();
  if (/\bG8BPQ\b|\bBPQ/.test(upper)) return "BPQ";
  if (/XROUTER|\bXRPI\b/.test(upper)) return "XRouter";
  if (/\bF6FBB\b|\bFBB\b/.test(upper)) return "FBB";
  if (/\bJNOS\b|\bNOS\b/.test(upper)) return "JNOS";
  // The ALIAS:CALL} banner is BPQ's prompt style
  if (hasBanner) return "BPQ";
  return "Unknown";
}
