/**
 * Timeout policy for half-duplex packet links. Every figure grows with the
 * hop count: a degraded simplex path needs a full packet turnaround per hop
 * before the next frame can go out.
 */

export interface Timeouts {
  /** Budget for one connect to complete. */
  connectMs: number;
  /** Budget for one command's response. */
  commandMs: number;
  /** Ceiling for everything done at one node, path included. */
  operationMs: number;
}

export interface TimeoutPolicy {
  compute(hops: number): Timeouts;
}

export const TIMEOUT_LIMITS = {
  connect: { baseMs: 20_000, perHopMs: 20_000, capMs: 120_000 },
  command: { baseMs: 5_000, perHopMs: 10_000, capMs: 60_000 },
  operation: { baseMs: 120_000, perHopMs: 60_000, capMs: 720_000 },
} as const;

/** Short write deadline that catches a silently dead link before a command is sent. */
export const LIVENESS_MS = 10_000;
/** Reads are taken in slices of this size so the overall ceiling is re-checked often. */
export const POLL_MS = 2_000;
/** Quiet period after data that ends a response with no prompt. */
export const IDLE_MS = 4_000;

function scaled(limit: { baseMs: number; perHopMs: number; capMs: number }, hops: number): number {
  return Math.min(limit.baseMs + limit.perHopMs * Math.max(0, hops), limit.capMs);
}

export function computeTimeouts(hops: number): Timeouts {
  return {
    connectMs: scaled(TIMEOUT_LIMITS.connect, hops),
    commandMs: scaled(TIMEOUT_LIMITS.command, hops),
    operationMs: scaled(TIMEOUT_LIMITS.operation, hops),
  };
}

export const defaultTimeoutPolicy: TimeoutPolicy = { compute: computeTimeouts };
