import { describe, it, expect } from "vitest";
import { stripTelnetCommands } from "./link.js";

describe("stripTelnetCommands", () => {
  it("removes option negotiation and keeps text", () => {
    const bytes = Uint8Array.from([255, 251, 1, 0x75, 0x73, 0x65, 0x72, 0x3a, 255, 253, 3]);
    expect(stripTelnetCommands(bytes)).toBe("user:");
  });

  it("skips subnegotiation blocks and unescapes doubled IAC", () => {
    const bytes = Uint8Array.from([0x41, 255, 250, 24, 1, 255, 240, 0x42, 255, 255]);
    expect(stripTelnetCommands(bytes)).toBe("ABÿ");
  });
});
