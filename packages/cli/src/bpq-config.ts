import { readFile } from "node:fs/promises";
import { PktmapError } from "@pktmap/schemas";
import type { ConfigLayer } from "./config.js";

export const DEFAULT_TELNET_PORT = 8010;

export interface BpqSettings {
  nodeCall?: string;
  telnetPort: number;
}

/**
 * Pull the node callsign and the telnet server's TCP port out of a
 * bpq32.cfg. TCPPORT only counts inside the telnet driver's port block;
 * other drivers (AXIP, KISS over TCP) have TCPPORT lines of their own.
 */
export function parseBpqConfig(text: string): BpqSettings {
  let nodeCall: string | undefined;
  let telnetPort: number | undefined;
  let inTelnet = false;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/;.*$/, "").trim().toUpperCase();
    if (line.length === 0) continue;

    if (nodeCall === undefined) {
      const m = /NODECALL\s*=\s*([A-Z0-9-]+)/.exec(line);
      if (m) {
        nodeCall = m[1];
        continue;
      }
    }
    if (/DRIVER\s*=\s*TELNET/.test(line) || /ID\s*=\s*TELNET SERVER/.test(line)) {
      inTelnet = true;
    } else if (/^ENDPORT\b/.test(line)) {
      inTelnet = false;
    } else if (inTelnet && telnetPort === undefined) {
      const m = /TCPPORT\s*=\s*(\d+)/.exec(line);
      if (m) telnetPort = parseInt(m[1] ?? "", 10);
    }
  }

  const settings: BpqSettings = { telnetPort: telnetPort ?? DEFAULT_TELNET_PORT };
  if (nodeCall !== undefined) settings.nodeCall = nodeCall;
  return settings;
}

export async function readBpqConfig(path: string): Promise<BpqSettings> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PktmapError("invalid_config", `Cannot read BPQ config ${path}: ${reason}`);
  }
  return parseBpqConfig(text);
}

export function configFromBpq(settings: BpqSettings): ConfigLayer {
  const layer: ConfigLayer = { port: settings.telnetPort };
  if (settings.nodeCall !== undefined) layer.local_node = settings.nodeCall;
  return layer;
}
