import { TimeoutError } from "./errors.js";

/**
 * Races a promise against a timeout. Rejects with a TimeoutError if the
 * timeout fires first. The timer is always cleaned up.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "Operation",
): Promise<T> {
  if (ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** A wall-clock budget that several bounded operations draw down. */
export class Deadline {
  private readonly expiresAt: number;

  constructor(readonly budgetMs: number, private readonly now: () => number = Date.now) {
    this.expiresAt = now() + budgetMs;
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.remaining() === 0;
  }
}
