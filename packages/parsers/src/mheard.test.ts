import { describe, it, expect } from "vitest";
import { parseMheard } from "./mheard.js";

const MHEARD = [
  "HILMA:N1WEC-15} Heard List for Port 1",
  "N1JMHX-15         00:00:03:12",
  "N1QX-7*           00:01:00:00",
  "K1ABC             02:04:00:00",
  "W1XYZ-27          00:00:00:05",
  "???",
].join("\n");

describe("parseMheard", () => {
  it("reads calls with elapsed time since heard", () => {
    const result = parseMheard(MHEARD, 1);
    expect(result.records).toEqual([
      { call: { base: "N1JMHX", ssid: 15 }, port: 1, digipeated: false, age_ms: 192_000 },
      { call: { base: "N1QX", ssid: 7 }, port: 1, digipeated: true, age_ms: 3_600_000 },
    ]);
  });

  it("rejects operators without SSID and SSIDs above 15", () => {
    const result = parseMheard(MHEARD, 1);
    expect(result.rejected).toEqual([
      { token: "K1ABC", reason: "missing_ssid", line: 4 },
      { token: "W1XYZ-27", reason: "ssid_out_of_range", line: 5 },
    ]);
    expect(result.skipped).toBe(1);
    expect(result.header).toBe(true);
  });

  it("prefers an explicit Port field over the requested port", () => {
    const result = parseMheard("N1SR-15  Port 2  heard 3 times\n", 1);
    expect(result.records).toEqual([{ call: { base: "N1SR", ssid: 15 }, port: 2, digipeated: false }]);
  });
});
