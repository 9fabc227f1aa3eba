import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger } from "./logger.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the component tag", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("crawler").info("visited", { node: "N1JMHX-15" });
    expect(log).toHaveBeenCalledWith("[crawler] visited", { node: "N1JMHX-15" });
  });

  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new ConsoleLogger("session", "warn");
    logger.debug("C N1JMHX-15");
    logger.warn("link quiet");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[session] link quiet", "");
  });

  it("sanitizes control characters and nests child tags", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("craw\nler").child("session").info("hello");
    expect(log).toHaveBeenCalledWith("[craw_ler:session] hello", "");
  });
});
