import type { LinkClass, PortInfo } from "@pktmap/schemas";
import { splitResponse, type ParseResult } from "./text.js";

export type PortsResult = ParseResult<"ports", PortInfo>;

const PORT_LINE = /^\s*(\d+)\s+(.+?)\s*$/;
const MHZ = /(\d+(?:\.\d+)?)\s*MHz/i;
const KHZ = /(\d+(?:\.\d+)?)\s*kHz/i;
const SPEED = /(\d+)\s*(?:baud|b\/s|bps)\b/i;
const IP_MARKERS = /telnet|tcp|udp|ax\/?ip|\bip\b|internet|ethernet/i;
const HF_MARKERS = /\bhf\b|vara|ardop|pactor|robust/i;

export function classifyLink(description: string, frequencyMhz?: number): LinkClass {
  if (IP_MARKERS.test(description)) return "ip";
  if (HF_MARKERS.test(description)) return "hf";
  if (frequencyMhz !== undefined && frequencyMhz < 30) return "hf";
  return "rf";
}

/** Parse PORTS output into port number, frequency, speed and link class. */
export function parsePorts(raw: string): PortsResult {
  const { lines, banner, header } = splitResponse(raw);
  const result: PortsResult = { kind: "ports", records: [], rejected: [], skipped: 0, banner, header };
  for (const line of lines) {
    const m = PORT_LINE.exec(line.text);
    if (!m) {
      result.skipped++;
      continue;
    }
    const description = m[2]!;
    const port: PortInfo = {
      number: parseInt(m[1]!, 10),
      description,
      link_class: "rf",
    };
    const mhz = MHZ.exec(description);
    const khz = KHZ.exec(description);
    if (mhz) port.frequency_mhz = parseFloat(mhz[1]!);
    else if (khz) port.frequency_mhz = parseFloat(khz[1]!) / 1000;
    const speed = SPEED.exec(description);
    if (speed) port.speed = parseInt(speed[1]!, 10);
    port.link_class = classifyLink(description, port.frequency_mhz);
    result.records.push(port);
  }
  return result;
}
