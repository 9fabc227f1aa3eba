/**
 * Breadth-first search over the known link graph.
 *
 * Neighbors are always visited in sorted order, so every search here is
 * deterministic for a given edge set.
 */

export interface PlanEdge {
  from: string;
  to: string;
  /** 0 = blocked by a sysop; null = heard on a port but never routed. */
  quality: number | null;
  bidirectional?: boolean;
}

export interface AdjacencyOptions {
  /**
   * Node whose heard-only (null quality) links may be used. Stations heard
   * on one of the local node's own ports can be connected to directly.
   */
  allowUnratedFrom?: string;
}

/** node → sorted list of nodes one connect away */
export type Adjacency = ReadonlyMap<string, readonly string[]>;

function pairKey(from: string, to: string): string {
  return `${from}>${to}`;
}

/**
 * Build the traversable adjacency. A direction any source marks with
 * quality 0 is never traversable, whatever other sources say about it.
 */
export function buildAdjacency(edges: Iterable<PlanEdge>, opts: AdjacencyOptions = {}): Adjacency {
  const list = [...edges];
  const blocked = new Set<string>();
  for (const e of list) {
    if (e.quality !== 0) continue;
    blocked.add(pairKey(e.from, e.to));
    if (e.bidirectional) blocked.add(pairKey(e.to, e.from));
  }

  const out = new Map<string, Set<string>>();
  const link = (from: string, to: string): void => {
    if (from === to || blocked.has(pairKey(from, to))) return;
    const set = out.get(from);
    if (set) set.add(to);
    else out.set(from, new Set([to]));
  };
  for (const e of list) {
    if (e.quality === 0) continue;
    if (e.quality === null) {
      if (e.from === opts.allowUnratedFrom) link(e.from, e.to);
      if (e.bidirectional && e.to === opts.allowUnratedFrom) link(e.to, e.from);
      continue;
    }
    link(e.from, e.to);
    if (e.bidirectional) link(e.to, e.from);
  }

  const adjacency = new Map<string, string[]>();
  for (const [from, set] of out) adjacency.set(from, [...set].sort());
  return adjacency;
}

export interface BfsTree {
  /** hop count from the root */
  distance: Map<string, number>;
  /** first-discovered parent of each reached node */
  parent: Map<string, string>;
}

export function bfsTree(adjacency: Adjacency, start: string): BfsTree {
  const distance = new Map<string, number>([[start, 0]]);
  const parent = new Map<string, string>();
  const queue: string[] = [start];
  while (queue.length > 0) {
    const node = queue.shift()!;
    const d = distance.get(node) ?? 0;
    for (const next of adjacency.get(node) ?? []) {
      if (distance.has(next)) continue;
      distance.set(next, d + 1);
      parent.set(next, node);
      queue.push(next);
    }
  }
  return { distance, parent };
}

/** Hop count from `start` to every node it can reach. */
export function hopDistance(adjacency: Adjacency, start: string): Map<string, number> {
  return bfsTree(adjacency, start).distance;
}

/** Walk parent pointers back to the root; null if `target` was not reached. */
export function treePath(tree: BfsTree, target: string): string[] | null {
  if (!tree.distance.has(target)) return null;
  const path = [target];
  let node = target;
  for (let parent = tree.parent.get(node); parent !== undefined; parent = tree.parent.get(node)) {
    path.unshift(parent);
    node = parent;
  }
  return path;
}

/**
 * Shortest path from `start` to `target` as a node list including both
 * ends. Null if unreachable, `[start]` if already there.
 */
export function shortestPath(adjacency: Adjacency, start: string, target: string): string[] | null {
  if (start === target) return [start];
  return treePath(bfsTree(adjacency, start), target);
}
