import type { Callsign, RouteEvidence, TieBreakPolicy } from "@pktmap/schemas";
import { isValidSsid } from "@pktmap/parsers";

export type ResolutionSource = "forced" | "routes" | "advertised" | "tie_break" | "nodes" | "mheard";

export type ResolutionConfidence = "high" | "medium" | "low";

export interface IdentityResolution {
  call: Callsign;
  source: ResolutionSource;
  confidence: ResolutionConfidence;
}

export interface ResolveContext {
  /** Operator override for this base callsign. */
  forced?: number;
  /** SSIDs the node advertises for itself (prompt banner, own alias). */
  advertised?: readonly number[];
  policy: TieBreakPolicy;
}

/**
 * One link of the resolution chain. Returns null to pass the decision to
 * the next stage.
 */
export type IdentityStage = (
  base: string,
  evidence: readonly RouteEvidence[],
  ctx: ResolveContext,
) => IdentityResolution | null;

interface Tally {
  /** ssid → votes */
  votes: Map<number, number>;
  /** ssid → most recent observation seq */
  latest: Map<number, number>;
}

/**
 * Count one vote per observer, taking that observer's most recent
 * observation so a re-crawled neighbor does not vote twice.
 */
export function tally(evidence: readonly RouteEvidence[], source: RouteEvidence["source"]): Tally {
  const byObserver = new Map<string, RouteEvidence>();
  for (const e of evidence) {
    if (e.source !== source) continue;
    const prev = byObserver.get(e.observer);
    if (!prev || e.seq >= prev.seq) byObserver.set(e.observer, e);
  }
  const votes = new Map<number, number>();
  const latest = new Map<number, number>();
  for (const e of byObserver.values()) {
    votes.set(e.ssid, (votes.get(e.ssid) ?? 0) + 1);
    latest.set(e.ssid, Math.max(latest.get(e.ssid) ?? -1, e.seq));
  }
  return { votes, latest };
}

/** SSIDs sharing the highest vote count, ascending. */
export function leaders(t: Tally): number[] {
  let best = 0;
  for (const n of t.votes.values()) best = Math.max(best, n);
  if (best === 0) return [];
  return [...t.votes.entries()].filter(([, n]) => n === best).map(([ssid]) => ssid).sort((a, b) => a - b);
}

export function breakTie(candidates: readonly number[], latest: ReadonlyMap<number, number>, policy: TieBreakPolicy): number | null {
  if (candidates.length === 0) return null;
  const sorted = [...candidates].sort((a, b) => a - b);
  switch (policy) {
    case "lowest_ssid":
      return sorted[0] ?? null;
    case "highest_ssid":
      return sorted[sorted.length - 1] ?? null;
    case "most_recent": {
      let pick: number | null = null;
      let pickSeq = -Infinity;
      for (const ssid of sorted) {
        const seq = latest.get(ssid) ?? -1;
        // strict > keeps the lower SSID when two share a seq
        if (seq > pickSeq) {
          pick = ssid;
          pickSeq = seq;
        }
      }
      return pick;
    }
  }
}

function resolved(base: string, ssid: number, source: ResolutionSource, confidence: ResolutionConfidence): IdentityResolution {
  return { call: { base, ssid }, source, confidence };
}

export const forcedStage: IdentityStage = (base, _evidence, ctx) =>
  ctx.forced !== undefined && isValidSsid(ctx.forced) ? resolved(base, ctx.forced, "forced", "high") : null;

export const routesConsensusStage: IdentityStage = (base, evidence) => {
  const top = leaders(tally(evidence, "routes"));
  return top.length === 1 && top[0] !== undefined ? resolved(base, top[0], "routes", "high") : null;
};

/** A split ROUTES vote is settled by the SSID the node advertises for itself. */
export const advertisedStage: IdentityStage = (base, evidence, ctx) => {
  const top = leaders(tally(evidence, "routes"));
  const own = (ctx.advertised ?? []).filter((ssid) => top.includes(ssid));
  if (top.length < 2 || own.length !== 1 || own[0] === undefined) return null;
  return resolved(base, own[0], "advertised", "high");
};

export const routesTieBreakStage: IdentityStage = (base, evidence, ctx) => {
  const t = tally(evidence, "routes");
  const pick = breakTie(leaders(t), t.latest, ctx.policy);
  return pick === null ? null : resolved(base, pick, "tie_break", "medium");
};

/** No route names this call: fall back on alias tables. */
export const aliasStage: IdentityStage = (base, evidence, ctx) => {
  const t = tally(evidence, "nodes");
  const top = leaders(t);
  const own = (ctx.advertised ?? []).filter((ssid) => top.includes(ssid));
  const pick = own.length === 1 && own[0] !== undefined ? own[0] : breakTie(top, t.latest, ctx.policy);
  return pick === null ? null : resolved(base, pick, "nodes", "medium");
};

export const mheardStage: IdentityStage = (base, evidence, ctx) => {
  const t = tally(evidence, "mheard");
  const pick = breakTie(leaders(t), t.latest, ctx.policy);
  return pick === null ? null : resolved(base, pick, "mheard", "low");
};

export const DEFAULT_STAGES: readonly IdentityStage[] = [
  forcedStage,
  routesConsensusStage,
  advertisedStage,
  routesTieBreakStage,
  aliasStage,
  mheardStage,
];

/**
 * Resolve the connectable SSID for a base callsign from the evidence seen
 * so far. Returns null when nothing names an SSID for it. SSIDs are only
 * ever taken from evidence, never derived from a numbering convention.
 */
export function resolveIdentity(
  base: string,
  evidence: readonly RouteEvidence[],
  ctx: ResolveContext,
  stages: readonly IdentityStage[] = DEFAULT_STAGES,
): IdentityResolution | null {
  const upper = base.toUpperCase();
  for (const stage of stages) {
    const result = stage(upper, evidence, ctx);
    if (result) return result;
  }
  return null;
}
