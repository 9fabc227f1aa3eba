import { describe, it, expect } from "vitest";
import { Deadline, sleep, withTimeout } from "./timeout.js";
import { PktmapError, TimeoutError } from "./errors.js";

describe("TimeoutError", () => {
  it("is a PktmapError with the timeout code", () => {
    const err = new TimeoutError("test");
    expect(err).toBeInstanceOf(PktmapError);
    expect(err.name).toBe("TimeoutError");
    expect(err.code).toBe("timeout");
  });
});

describe("withTimeout", () => {
  it("resolves when the promise completes before the timeout", async () => {
    expect(await withTimeout(Promise.resolve(42), 1000)).toBe(42);
  });

  it("rejects with TimeoutError when the promise exceeds the timeout", async () => {
    const slow = new Promise<void>((resolve) => setTimeout(resolve, 5000));
    await expect(withTimeout(slow, 50, "ROUTES read")).rejects.toThrow("ROUTES read timed out after 50ms");
  });

  it("passes through rejections from the original promise", async () => {
    await expect(withTimeout(Promise.reject(new Error("link reset")), 1000)).rejects.toThrow("link reset");
  });

  it("returns the promise directly when ms <= 0", async () => {
    expect(await withTimeout(Promise.resolve("fast"), 0)).toBe("fast");
  });
});

describe("Deadline", () => {
  it("draws down against the injected clock", () => {
    let t = 1_000;
    const deadline = new Deadline(500, () => t);
    expect(deadline.remaining()).toBe(500);
    t = 1_300;
    expect(deadline.remaining()).toBe(200);
    expect(deadline.expired()).toBe(false);
    t = 2_000;
    expect(deadline.remaining()).toBe(0);
    expect(deadline.expired()).toBe(true);
  });

  it("sleep(0) resolves immediately", async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});
