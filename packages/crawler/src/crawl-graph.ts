import type { AliasConfidence, EdgeRecord, GraphDocument, LinkClass, NodeRecord } from "@pktmap/schemas";
import { baseOf } from "@pktmap/parsers";
import type { PlanEdge } from "@pktmap/planner";
import { emptyNode, sortedUnion, type GraphDelta } from "@pktmap/graph";

/** One direction of one link, keyed by base callsigns. */
interface DirectedEdge {
  from: string;
  to: string;
  /** port → routed quality on that port; null where it was only heard */
  ports: Map<number, number | null>;
  frequencies: Set<number>;
  link_class: LinkClass;
  observers: Set<string>;
  /** Observed during this crawl rather than carried over from the prior document. */
  fresh: boolean;
}

export interface EdgeObservation {
  port: number;
  quality: number | null;
  link_class: LinkClass;
  frequency_mhz?: number;
}

const ALIAS_RANK: Record<AliasConfidence, number> = { forced: 3, advertised: 2, nodes: 1, mheard: 0 };

function directedKey(from: string, to: string, linkClass: LinkClass): string {
  return `${from}>${to}|${linkClass}`;
}

/**
 * Quality of a set of port ratings: the best positive one, 0 only when
 * every rated port is blocked, null when no port was ever routed.
 */
function combinedQuality(qualities: Iterable<number | null>): number | null {
  let best: number | null = null;
  for (const q of qualities) {
    if (q === null) continue;
    if (best === null || q > best) best = q;
  }
  return best;
}

/**
 * A saved edge carries one rating, so blocked ports are listed only when no
 * other port of the link is usable.
 */
function exportedPorts(ports: ReadonlyMap<number, number | null>): number[] {
  const usable = [...ports].filter(([, quality]) => quality !== 0).map(([port]) => port);
  return sortedUnion(usable.length > 0 ? usable : [...ports.keys()]);
}

/**
 * Working graph for one crawl. Everything is keyed by base callsign because
 * the connectable SSID of a node can change as evidence accumulates; ids are
 * only fixed when the crawl's results are exported as a delta.
 */
export class CrawlGraph {
  private records = new Map<string, NodeRecord>();
  private edges = new Map<string, DirectedEdge>();
  private heardAt = new Map<string, number>();

  /** Carry the prior document's links and last-heard times into planning. */
  seed(doc: GraphDocument): void {
    for (const node of Object.values(doc.nodes)) {
      if (node.last_heard) this.heard(baseOf(node.call), Date.parse(node.last_heard));
    }
    for (const e of doc.edges) {
      const from = baseOf(e.from);
      const to = baseOf(e.to);
      const directions: Array<[string, string]> = e.bidirectional ? [[from, to], [to, from]] : [[from, to]];
      for (const [a, b] of directions) {
        this.edges.set(directedKey(a, b, e.link_class), {
          from: a,
          to: b,
          ports: new Map(e.ports.map((port): [number, number | null] => [port, e.quality])),
          frequencies: new Set(e.frequencies),
          link_class: e.link_class,
          observers: new Set(e.observed_by),
          fresh: false,
        });
      }
    }
  }

  /** Working record for a base callsign, created as a stub on first use. */
  record(base: string): NodeRecord {
    let rec = this.records.get(base);
    if (!rec) {
      rec = emptyNode(base);
      this.records.set(base, rec);
    }
    return rec;
  }

  /**
   * Record a link seen in `from`'s tables. Ratings are kept per port; a
   * routed quality observed in this crawl replaces the one on file.
   */
  observe(from: string, to: string, obs: EdgeObservation, observer: string): void {
    if (from === to) return;
    const key = directedKey(from, to, obs.link_class);
    const prev = this.edges.get(key);
    const edge: DirectedEdge = prev && prev.fresh
      ? prev
      : {
          from, to, ports: new Map(), frequencies: new Set(),
          link_class: obs.link_class, observers: new Set(), fresh: true,
        };
    // a heard-only sighting keeps whatever rating the port already has
    const known = edge.ports.get(obs.port) ?? prev?.ports.get(obs.port) ?? null;
    edge.ports.set(obs.port, obs.quality ?? known);
    if (obs.frequency_mhz !== undefined) edge.frequencies.add(obs.frequency_mhz);
    edge.observers.add(observer);
    this.edges.set(key, edge);
  }

  /**
   * Port on which `from` reaches `to`, if `from`'s own tables name one.
   * Blocked ports are never offered; the best rating wins, then the lowest port.
   */
  portFor(from: string, to: string): number | undefined {
    let best: { port: number; quality: number } | undefined;
    for (const e of this.edges.values()) {
      if (e.from !== from || e.to !== to) continue;
      for (const [port, quality] of e.ports) {
        if (quality === 0) continue;
        const rank = quality ?? -1;
        if (!best || rank > best.quality || (rank === best.quality && port < best.port)) {
          best = { port, quality: rank };
        }
      }
    }
    return best?.port;
  }

  heard(base: string, at: number): void {
    if (!Number.isFinite(at)) return;
    const prev = this.heardAt.get(base);
    if (prev === undefined || at > prev) this.heardAt.set(base, at);
  }

  lastHeard(base: string): number | undefined {
    return this.heardAt.get(base);
  }

  setAlias(base: string, alias: string, call: string, confidence: AliasConfidence): void {
    const rec = this.record(base);
    const prev = rec.aliases[alias];
    if (prev && ALIAS_RANK[prev.confidence] > ALIAS_RANK[confidence]) return;
    rec.aliases = { ...rec.aliases, [alias]: { call, confidence } };
  }

  /** One planning edge per direction, rated across every port and link class. */
  planEdges(): PlanEdge[] {
    const byPair = new Map<string, PlanEdge & { ratings: Array<number | null> }>();
    for (const e of this.edges.values()) {
      const key = `${e.from}>${e.to}`;
      let pair = byPair.get(key);
      if (!pair) {
        pair = { from: e.from, to: e.to, quality: null, ratings: [] };
        byPair.set(key, pair);
      }
      pair.ratings.push(...e.ports.values());
    }
    return [...byPair.values()].map(({ from, to, ratings }) => ({ from, to, quality: combinedQuality(ratings) }));
  }

  /**
   * Export this crawl's records under canonical ids. Bases `idOf` cannot
   * resolve are left out, together with their links.
   */
  toDelta(idOf: (base: string) => string | null): GraphDelta {
    const ids = (bases: readonly string[]): string[] =>
      sortedUnion(bases.map(idOf).filter((id): id is string => id !== null));

    const nodes: NodeRecord[] = [];
    for (const [base, rec] of this.records) {
      const id = idOf(base);
      if (id === null) continue;
      const node: NodeRecord = { ...rec, call: id, neighbors: ids(rec.neighbors), seen_by: sortedUnion(rec.seen_by) };
      const heard = this.heardAt.get(base);
      if (heard !== undefined) node.last_heard = new Date(heard).toISOString();
      nodes.push(node);
    }

    const edges: EdgeRecord[] = [];
    for (const e of this.edges.values()) {
      if (!e.fresh) continue;
      const from = idOf(e.from);
      const to = idOf(e.to);
      if (from === null || to === null) continue;
      edges.push({
        from,
        to,
        ports: exportedPorts(e.ports),
        quality: combinedQuality(e.ports.values()),
        frequencies: sortedUnion([...e.frequencies]),
        link_class: e.link_class,
        bidirectional: false,
        observed_by: sortedUnion([...e.observers]),
      });
    }
    return { nodes, edges };
  }
}
