import { bfsTree, treePath, type Adjacency } from "./bfs.js";

export interface CandidatePath {
  /** Node ids from the start node to the target, both included. */
  nodes: string[];
  hops: number;
  /** Last node before the target. */
  via: string;
}

export interface PlanOptions {
  /** Default 3. */
  maxCandidates?: number;
  /** Extra hops over the minimum an alternate parent may cost. Default 1. */
  slack?: number;
}

/**
 * Candidate paths from `start` to `target`, one per parent that reaches the
 * target within `slack` hops of the minimum. Each candidate follows the
 * shortest path to its parent. Ordered by hop count, then parent id.
 */
export function planPaths(adjacency: Adjacency, start: string, target: string, opts: PlanOptions = {}): CandidatePath[] {
  const maxCandidates = opts.maxCandidates ?? 3;
  const slack = opts.slack ?? 1;
  if (start === target) return [{ nodes: [start], hops: 0, via: start }];

  const tree = bfsTree(adjacency, start);
  const best = tree.distance.get(target);
  if (best === undefined) return [];

  const candidates: CandidatePath[] = [];
  for (const [parent, next] of adjacency) {
    if (parent === target || !next.includes(target)) continue;
    const d = tree.distance.get(parent);
    if (d === undefined || d + 1 > best + slack) continue;
    const prefix = treePath(tree, parent);
    if (!prefix || prefix.includes(target)) continue;
    candidates.push({ nodes: [...prefix, target], hops: prefix.length, via: parent });
  }
  candidates.sort((a, b) => a.hops - b.hops || (a.via < b.via ? -1 : a.via > b.via ? 1 : 0));
  return candidates.slice(0, maxCandidates);
}
