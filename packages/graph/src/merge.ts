import { resolve } from "node:path";
import {
  SelfMergeAttemptError,
  type AliasConfidence, type AliasEntry, type Application, type EdgeRecord, type GraphDocument,
  type Logger, type NodeLocation, type NodeRecord, type PortInfo,
} from "@pktmap/schemas";
import { baseOf } from "@pktmap/parsers";
import { compareEdges, emptyDocument, emptyNode, linkKey, sortedUnion, withTotals } from "./document.js";

const CONFIDENCE_RANK: Record<AliasConfidence, number> = { forced: 3, advertised: 2, nodes: 1, mheard: 0 };

function locationDetail(loc: NodeLocation): number {
  return Object.values(loc).filter((v) => v !== undefined && v !== "").length;
}

function moreDetailedLocation(a: NodeLocation, b: NodeLocation): NodeLocation {
  return locationDetail(b) > locationDetail(a) ? b : a;
}

function portDetail(p: PortInfo): number {
  return (p.frequency_mhz !== undefined ? 1 : 0) + (p.speed !== undefined ? 1 : 0) + (p.description ? 1 : 0);
}

function mergePorts(a: readonly PortInfo[], b: readonly PortInfo[]): PortInfo[] {
  const byNumber = new Map<number, PortInfo>();
  for (const p of [...a, ...b]) {
    const prev = byNumber.get(p.number);
    if (!prev || portDetail(p) > portDetail(prev)) byNumber.set(p.number, p);
  }
  return [...byNumber.values()].sort((x, y) => x.number - y.number);
}

function mergeApplications(a: readonly Application[], b: readonly Application[]): Application[] {
  const byName = new Map<string, Application>();
  for (const app of [...a, ...b]) {
    const prev = byName.get(app.name);
    if (!prev || (!prev.call && app.call) || (!prev.description && app.description)) byName.set(app.name, app);
  }
  return [...byName.values()].sort((x, y) => x.name.localeCompare(y.name));
}

function mergeAliases(a: Record<string, AliasEntry>, b: Record<string, AliasEntry>): Record<string, AliasEntry> {
  const out: Record<string, AliasEntry> = { ...a };
  for (const [alias, entry] of Object.entries(b)) {
    const prev = out[alias];
    if (!prev || CONFIDENCE_RANK[entry.confidence] > CONFIDENCE_RANK[prev.confidence]) out[alias] = entry;
  }
  return Object.fromEntries(Object.entries(out).sort(([x], [y]) => x.localeCompare(y)));
}

function laterOf(a?: string, b?: string): string | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return a >= b ? a : b;
}

/**
 * Combine two records of the same node from independent perspectives.
 * Set-valued fields are unioned; for scalars the more detailed value wins,
 * `a` breaking ties.
 */
export function mergeNode(a: NodeRecord, b: NodeRecord): NodeRecord {
  const merged: NodeRecord = {
    call: a.call,
    node_type: a.node_type !== "Unknown" ? a.node_type : b.node_type,
    location: moreDetailedLocation(a.location, b.location),
    ports: mergePorts(a.ports, b.ports),
    aliases: mergeAliases(a.aliases, b.aliases),
    applications: mergeApplications(a.applications, b.applications),
    commands: sortedUnion(a.commands, b.commands),
    neighbors: sortedUnion(a.neighbors, b.neighbors),
    seen_by: sortedUnion(a.seen_by, b.seen_by),
  };
  const note = a.note || b.note;
  if (note) merged.note = note;
  const lastHeard = laterOf(a.last_heard, b.last_heard);
  if (lastHeard) merged.last_heard = lastHeard;
  const lastCrawled = laterOf(a.last_crawled, b.last_crawled);
  if (lastCrawled) merged.last_crawled = lastCrawled;
  const forced = a.forced_ssid ?? b.forced_ssid;
  if (forced !== undefined) merged.forced_ssid = forced;
  return merged;
}

/** 0 if any observation marks the link blocked, else the best rating seen. */
function combinedQuality(records: readonly EdgeRecord[]): number | null {
  let best: number | null = null;
  for (const r of records) {
    if (r.quality === 0) return 0;
    if (r.quality !== null) best = best === null ? r.quality : Math.max(best, r.quality);
  }
  return best;
}

/**
 * Collapse every record of one physical link into a single edge. Quality
 * comes from `rated` when given: a fresh observation replaces old ratings.
 */
function coalesce(records: readonly EdgeRecord[], rated: readonly EdgeRecord[] = records): EdgeRecord {
  const first = records[0]!;
  const directions = new Set(records.map((r) => `${r.from}>${r.to}`));
  const bidirectional = records.some((r) => r.bidirectional) || directions.size > 1;
  const [from, to] = bidirectional && first.from > first.to ? [first.to, first.from] : [first.from, first.to];
  return {
    from,
    to,
    ports: sortedUnion(...records.map((r) => r.ports)),
    quality: combinedQuality(rated),
    frequencies: sortedUnion(...records.map((r) => r.frequencies)),
    link_class: first.link_class,
    bidirectional,
    observed_by: sortedUnion(...records.map((r) => r.observed_by)),
  };
}

/**
 * Coalesce A→B and B→A observations of the same link into one logical
 * edge with unioned ports, frequencies and provenance.
 */
export function mergeEdges(...lists: ReadonlyArray<readonly EdgeRecord[]>): EdgeRecord[] {
  return [...groupByLink(lists.flat()).values()].map((group) => coalesce(group)).sort(compareEdges);
}

function groupByLink(edges: readonly EdgeRecord[]): Map<string, EdgeRecord[]> {
  const groups = new Map<string, EdgeRecord[]>();
  for (const edge of edges) {
    const key = linkKey(edge);
    const group = groups.get(key);
    if (group) group.push(edge);
    else groups.set(key, [edge]);
  }
  return groups;
}

/** Like mergeEdges, but a link the session observed takes its quality from the session. */
function applyEdges(prior: readonly EdgeRecord[], fresh: readonly EdgeRecord[]): EdgeRecord[] {
  const freshGroups = groupByLink(fresh);
  return [...groupByLink([...prior, ...fresh]).entries()]
    .map(([key, group]) => coalesce(group, freshGroups.get(key)))
    .sort(compareEdges);
}

function mergeNodeMaps(a: Record<string, NodeRecord>, b: Record<string, NodeRecord>): Record<string, NodeRecord> {
  const out: Record<string, NodeRecord> = { ...a };
  for (const [id, node] of Object.entries(b)) {
    const prev = out[id];
    out[id] = prev ? mergeNode(prev, node) : node;
  }
  return Object.fromEntries(Object.entries(out).sort(([x], [y]) => x.localeCompare(y)));
}

/** Union of two perspective documents; `a` supplies the metadata. */
export function combineDocuments(a: GraphDocument, b: GraphDocument, generatedAt = new Date().toISOString()): GraphDocument {
  return withTotals({
    format_version: 2,
    generated_at: generatedAt,
    nodes: mergeNodeMaps(a.nodes, b.nodes),
    edges: mergeEdges(a.edges, b.edges),
    meta: {
      ...a.meta,
      complete: a.meta.complete && b.meta.complete,
      visited: sortedUnion(a.meta.visited, b.meta.visited),
      sources: sortedUnion(a.meta.sources, b.meta.sources),
    },
  });
}

export interface MergeInput {
  path: string;
  document: GraphDocument;
}

export interface MergeOptions {
  /** The document being written; it may never be one of its own inputs. */
  outputPath: string;
  /** Throw on a self-merge instead of filtering it out. */
  strict?: boolean;
  logger?: Logger;
  generatedAt?: string;
}

export interface MergeResult {
  document: GraphDocument;
  merged: string[];
  rejected: SelfMergeAttemptError[];
}

/**
 * Merge external perspective documents into `base`. Inputs that resolve to
 * the output path are filtered and reported.
 */
export function mergeDocuments(base: GraphDocument | null, inputs: readonly MergeInput[], opts: MergeOptions): MergeResult {
  const output = resolve(opts.outputPath);
  const rejected: SelfMergeAttemptError[] = [];
  const merged: string[] = [];
  let document = base;
  for (const input of inputs) {
    if (resolve(input.path) === output) {
      const err = new SelfMergeAttemptError(input.path);
      if (opts.strict) throw err;
      opts.logger?.warn(err.message);
      rejected.push(err);
      continue;
    }
    const tagged: GraphDocument = {
      ...input.document,
      meta: { ...input.document.meta, sources: sortedUnion(input.document.meta.sources, [input.path]) },
    };
    document = document ? combineDocuments(document, tagged, opts.generatedAt) : withTotals(tagged);
    merged.push(input.path);
  }
  return { document: document ?? emptyDocument({ write_mode: "merge" }, opts.generatedAt), merged, rejected };
}

/** Node and edge records produced by one crawl. */
export interface GraphDelta {
  nodes: NodeRecord[];
  edges: EdgeRecord[];
}

/** Fields a fresh session replaces outright rather than unions. */
function supersede(prev: NodeRecord, next: NodeRecord): NodeRecord {
  const merged = mergeNode(next, prev);
  if (!next.last_crawled) return merged;
  if (next.ports.length > 0) merged.ports = next.ports;
  if (next.applications.length > 0) merged.applications = next.applications;
  if (next.commands.length > 0) merged.commands = next.commands;
  merged.neighbors = sortedUnion(next.neighbors);
  if (locationDetail(next.location) > 0) merged.location = next.location;
  return merged;
}

function renameEdges(edges: readonly EdgeRecord[], from: string, to: string): EdgeRecord[] {
  return edges.map((e) => ({
    ...e,
    from: e.from === from ? to : e.from,
    to: e.to === from ? to : e.to,
  }));
}

/**
 * Fold one crawl's results into a document, keyed by canonical identity.
 * A visited node replaces the record of the same base callsign under a
 * stale SSID. Earlier detail survives unless the session supersedes it.
 */
export function applySession(doc: GraphDocument, delta: GraphDelta): GraphDocument {
  const nodes: Record<string, NodeRecord> = { ...doc.nodes };
  let docEdges = [...doc.edges];
  let deltaEdges = [...delta.edges];

  const byBase = new Map<string, string>();
  for (const id of Object.keys(nodes)) byBase.set(baseOf(id), id);

  for (const node of delta.nodes) {
    const base = baseOf(node.call);
    const existingId = byBase.get(base);
    if (existingId !== undefined && existingId !== node.call) {
      const existing = nodes[existingId]!;
      if (node.last_crawled || node.forced_ssid !== undefined) {
        delete nodes[existingId];
        docEdges = renameEdges(docEdges, existingId, node.call);
        for (const [otherId, other] of Object.entries(nodes)) {
          if (other.neighbors.includes(existingId)) {
            nodes[otherId] = {
              ...other,
              neighbors: sortedUnion(other.neighbors.filter((n) => n !== existingId), [node.call]),
            };
          }
        }
        nodes[node.call] = supersede({ ...existing, call: node.call }, node);
        byBase.set(base, node.call);
      } else {
        // an unconfirmed sighting folds into the record already on file
        nodes[existingId] = mergeNode(existing, { ...node, call: existingId });
        deltaEdges = renameEdges(deltaEdges, node.call, existingId);
      }
      continue;
    }
    const prev = nodes[node.call];
    nodes[node.call] = prev ? supersede(prev, node) : node;
    byBase.set(base, node.call);
  }

  const edges = applyEdges(docEdges, deltaEdges);
  for (const e of edges) {
    for (const id of [e.from, e.to]) {
      if (!nodes[id]) nodes[id] = emptyNode(id);
    }
  }
  return withTotals({
    ...doc,
    nodes: Object.fromEntries(Object.entries(nodes).sort(([x], [y]) => x.localeCompare(y))),
    edges,
  });
}
