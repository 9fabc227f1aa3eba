export type NodeState = "frontier" | "attempting" | "visited" | "excluded";

export interface FrontierEntry {
  /** Base callsign; the connectable SSID is resolved at attempt time. */
  base: string;
  state: NodeState;
  attempts: number;
  /** Path keys already tried for this node. */
  tried: Set<string>;
  /** Enqueue order, for FIFO among equal distances. */
  order: number;
  /** No untried path is known; waits for the graph to grow. */
  parked: boolean;
}

/**
 * Per-node crawl state. A node absent from the frontier is Unknown. Entries
 * leave the Frontier state only as Visited or Excluded; a failed attempt
 * returns the entry to Frontier.
 */
export class Frontier {
  private entries = new Map<string, FrontierEntry>();
  private counter = 0;

  /** Enqueue an Unknown node. Returns null if it is already tracked. */
  add(base: string): FrontierEntry | null {
    if (this.entries.has(base)) return null;
    const entry: FrontierEntry = { base, state: "frontier", attempts: 0, tried: new Set(), order: this.counter++, parked: false };
    this.entries.set(base, entry);
    return entry;
  }

  get(base: string): FrontierEntry | undefined {
    return this.entries.get(base);
  }

  state(base: string): NodeState | "unknown" {
    return this.entries.get(base)?.state ?? "unknown";
  }

  /** Record a node as visited without attempting it (resumed crawls). */
  adoptVisited(base: string): void {
    const entry = this.add(base) ?? this.entries.get(base);
    if (entry) entry.state = "visited";
  }

  attempting(entry: FrontierEntry): void {
    entry.state = "attempting";
  }

  visited(entry: FrontierEntry): void {
    entry.state = "visited";
    entry.parked = false;
  }

  excluded(entry: FrontierEntry): void {
    entry.state = "excluded";
    entry.parked = false;
  }

  /** Back to Frontier after a failed attempt, to retry through another path. */
  release(entry: FrontierEntry): void {
    entry.state = "frontier";
  }

  park(entry: FrontierEntry): void {
    entry.state = "frontier";
    entry.parked = true;
  }

  unparkAll(): void {
    for (const entry of this.entries.values()) entry.parked = false;
  }

  /**
   * Next entry to attempt: nearest to the start node first, then FIFO.
   * Parked entries and those beyond the hop limit are passed over.
   */
  next(distanceOf: (base: string) => number | undefined, maxHops: number): FrontierEntry | null {
    let best: FrontierEntry | null = null;
    let bestDistance = Infinity;
    for (const entry of this.entries.values()) {
      if (entry.state !== "frontier" || entry.parked) continue;
      const d = distanceOf(entry.base);
      if (d === undefined || d > maxHops) continue;
      if (d < bestDistance || (d === bestDistance && best !== null && entry.order < best.order)) {
        best = entry;
        bestDistance = d;
      }
    }
    return best;
  }

  /** Entries still in the Frontier state, in enqueue order. */
  pending(): FrontierEntry[] {
    return [...this.entries.values()].filter((e) => e.state === "frontier").sort((a, b) => a.order - b.order);
  }
}
