import { describe, it, expect } from "vitest";
import { classifyLink, parsePorts } from "./ports.js";

describe("parsePorts", () => {
  it("extracts frequency, speed and link class", () => {
    const result = parsePorts([
      "HILMA:N1WEC-15} Ports",
      "  1 144.990 MHz 1200 BAUD",
      "  2 AX/IP/UDP",
      "  3 Telnet Server",
      "  4 7.101 MHz VARA HF",
      "  5 3590 kHz 300 baud",
    ].join("\r\n"));
    expect(result.records).toEqual([
      { number: 1, description: "144.990 MHz 1200 BAUD", frequency_mhz: 144.99, speed: 1200, link_class: "rf" },
      { number: 2, description: "AX/IP/UDP", link_class: "ip" },
      { number: 3, description: "Telnet Server", link_class: "ip" },
      { number: 4, description: "7.101 MHz VARA HF", frequency_mhz: 7.101, link_class: "hf" },
      { number: 5, description: "3590 kHz 300 baud", frequency_mhz: 3.59, speed: 300, link_class: "hf" },
    ]);
    expect(result.skipped).toBe(0);
  });

  it("classifies by description before frequency", () => {
    expect(classifyLink("VHF 1200", 145.05)).toBe("rf");
    expect(classifyLink("ARDOP", undefined)).toBe("hf");
    expect(classifyLink("TCPIP link", 145.05)).toBe("ip");
  });
});
