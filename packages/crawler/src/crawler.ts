import { rm, writeFile } from "node:fs/promises";
import { v4 as uuid } from "uuid";
import {
  PktmapError, ProtocolParseError, StaleNodeError, UnroutableTargetError, sleep as realSleep,
  type Callsign, type CrawlConfig, type GraphDocument, type HopSpec, type JournalEventType, type Logger,
  type RunSummary, type SkipReason,
} from "@pktmap/schemas";
import { baseOf, formatCallsign, parseCanonicalId, type RejectedEntry } from "@pktmap/parsers";
import { EvidenceStore, resolveIdentity, type IdentityResolution, type ResolveContext } from "@pktmap/identity";
import { SessionManager, type CredentialSource, type SessionOptions, type TerminalLink } from "@pktmap/session";
import { buildAdjacency, hopDistance, planPaths, type Adjacency, type PlanEdge } from "@pktmap/planner";
import {
  GraphStore, applySession, emptyDocument, exportCsv, isExcluded, mergeDocuments, partialPath, sortedUnion,
  type MergeInput,
} from "@pktmap/graph";
import type { Journal } from "@pktmap/journal";
import { CrawlGraph, type EdgeObservation } from "./crawl-graph.js";
import { Frontier, type FrontierEntry } from "./frontier.js";
import { collectNode, type NodeObservation } from "./observe.js";
import { SummaryBuilder } from "./summary.js";

export interface CrawlerOptions {
  config: CrawlConfig;
  /** Opens a fresh terminal link to the local node; called once per attempt. */
  openLink: () => Promise<TerminalLink>;
  logger?: Logger;
  journal?: Journal;
  /** Replaces `config.credentials`, e.g. with an interactive prompt. */
  credentials?: CredentialSource;
  session?: Pick<SessionOptions, "policy" | "pollMs" | "idleMs" | "livenessMs" | "now">;
  /** Wall clock for timestamps and staleness. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CrawlResult {
  document: GraphDocument;
  /** Where the document was written: the output path, or the partial file after an interrupt. */
  path: string;
  summary: RunSummary;
}

/** State owned by one run and threaded through every step of it. */
interface CrawlContext {
  crawlId: string;
  local: Callsign;
  start: Callsign;
  startId: string;
  prior: GraphDocument | null;
  graph: CrawlGraph;
  evidence: EvidenceStore;
  frontier: Frontier;
  summary: SummaryBuilder;
  forced: Map<string, number>;
  /** Bases whose forced SSID came from the operator and is written back. */
  pinned: Set<string>;
  advertised: Map<string, Set<number>>;
  /** Canonical id each visited base was reached under. */
  reached: Map<string, string>;
  /** Ids visited by an earlier, interrupted run being resumed. */
  resumed: string[];
  visited: string[];
  /** Bases the prior document records as crawled. */
  priorCrawled: Set<string>;
  /** Links proven by a successful connect that no table lists. */
  approaches: PlanEdge[];
}

type VisitOutcome = "visited" | "excluded" | "failed" | "parked" | "aborted";

type AttemptResult =
  | { status: "ok"; observation: NodeObservation }
  | { status: "failed" | "auth_failed"; detail: string }
  | { status: "aborted" };

interface PlannedPath {
  key: string;
  hops: HopSpec[];
}

const noopLogger: Logger = { debug() {}, info() {}, warn() {}, error() {} };

/** Evidence observer for identities carried over from the prior document. */
const PRIOR_OBSERVER = "PRIOR";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function requireCall(value: string, field: string): Callsign {
  const call = parseCanonicalId(value);
  if (!call) throw new PktmapError("invalid_config", `${field} is not a valid callsign: "${value}"`);
  return call;
}

/**
 * Breadth-first crawl outward from the start node. Each attempt opens a
 * fresh session at the local node, connects hop by hop along a planned
 * path, and reads the far node's tables. Failures come back as outcome
 * values and send the node back to the frontier to be retried through
 * another parent; only a visited node's data is kept.
 */
export class Crawler {
  private readonly config: CrawlConfig;
  private readonly openLink: () => Promise<TerminalLink>;
  private readonly logger: Logger;
  private readonly journal?: Journal;
  private readonly credentials: CredentialSource;
  private readonly sessionOptions: CrawlerOptions["session"];
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: CrawlerOptions) {
    this.config = opts.config;
    this.openLink = opts.openLink;
    this.logger = opts.logger ?? noopLogger;
    this.journal = opts.journal;
    this.credentials = opts.credentials ?? opts.config.credentials;
    this.sessionOptions = opts.session;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? realSleep;
  }

  async run(signal?: AbortSignal): Promise<CrawlResult> {
    const cfg = this.config;
    const local = requireCall(cfg.local_node, "local_node");
    const start = requireCall(cfg.start_node || cfg.local_node, "start_node");
    const startId = formatCallsign(start);
    const store = new GraphStore(cfg.output_path, this.logger);
    const partial = new GraphStore(partialPath(cfg.output_path, startId), this.logger);
    const crawlId = uuid();

    let prior = cfg.write_mode === "overwrite" ? null : await store.load();
    let resumed: string[] = [];
    if (cfg.mode === "update") {
      const saved = await partial.load();
      if (saved && !saved.meta.complete && saved.meta.start_node === startId) {
        prior = saved;
        resumed = saved.meta.visited;
        this.logger.info("resuming interrupted crawl", { from: partial.filePath, visited: resumed.length });
      }
    }

    const ctx: CrawlContext = {
      crawlId,
      local,
      start,
      startId,
      prior,
      graph: new CrawlGraph(),
      evidence: new EvidenceStore(),
      frontier: new Frontier(),
      summary: new SummaryBuilder(crawlId, this.iso()),
      forced: new Map(),
      pinned: new Set(),
      advertised: new Map(),
      reached: new Map(),
      resumed,
      visited: [],
      priorCrawled: new Set(),
      approaches: [],
    };
    this.seed(ctx, cfg.start_node.includes("-"));

    this.logger.info("crawl started", { crawl_id: crawlId, start: startId, mode: cfg.mode, max_hops: cfg.max_hops });
    await this.emit(ctx, "crawl.started", {
      start_node: startId, mode: cfg.mode, write_mode: cfg.write_mode, max_hops: cfg.max_hops, resumed: resumed.length,
    });

    let interrupted = false;
    for (;;) {
      if (signal?.aborted) {
        interrupted = true;
        break;
      }
      const distances = hopDistance(this.adjacency(ctx), start.base);
      const entry = ctx.frontier.next((b) => distances.get(b), cfg.max_hops);
      if (!entry) break;
      const outcome = await this.visit(ctx, entry, signal);
      if (outcome === "aborted") {
        interrupted = true;
        break;
      }
      if (outcome === "visited") await this.sleep(cfg.node_delay_ms);
    }

    await this.settle(ctx, interrupted);
    return this.finish(ctx, store, partial, interrupted);
  }

  // ─── Setup ──────────────────────────────────────────────────────

  private seed(ctx: CrawlContext, startHasSsid: boolean): void {
    const cfg = this.config;
    for (const [call, ssid] of Object.entries(cfg.force_ssid)) {
      ctx.forced.set(baseOf(call), ssid);
      ctx.pinned.add(baseOf(call));
    }
    if (startHasSsid && ctx.start.base !== ctx.local.base && !ctx.forced.has(ctx.start.base)) {
      ctx.forced.set(ctx.start.base, ctx.start.ssid);
    }

    const prior = ctx.prior;
    if (prior) {
      ctx.graph.seed(prior);
      for (const node of Object.values(prior.nodes)) {
        const call = parseCanonicalId(node.call);
        if (!call) continue;
        ctx.evidence.seed(call.base, call.ssid, "routes", PRIOR_OBSERVER);
        if (node.forced_ssid !== undefined && !ctx.forced.has(call.base)) {
          ctx.forced.set(call.base, node.forced_ssid);
          ctx.pinned.add(call.base);
        }
        for (const alias of Object.values(node.aliases)) {
          const aliased = alias.confidence === "advertised" ? parseCanonicalId(alias.call) : null;
          if (aliased) this.advertise(ctx, aliased);
        }
        if (node.last_crawled) ctx.priorCrawled.add(call.base);
      }
    }

    ctx.frontier.add(ctx.start.base);
    for (const id of ctx.resumed) {
      ctx.frontier.adoptVisited(baseOf(id));
      ctx.reached.set(baseOf(id), id);
    }
    if (!prior) return;
    const seedAll = cfg.mode === "reaudit" || ctx.resumed.length > 0;
    for (const node of Object.values(prior.nodes)) {
      if (seedAll || (cfg.mode === "new-only" && !node.last_crawled)) ctx.frontier.add(baseOf(node.call));
    }
  }

  // ─── One node ───────────────────────────────────────────────────

  private async visit(ctx: CrawlContext, entry: FrontierEntry, signal?: AbortSignal): Promise<VisitOutcome> {
    const cfg = this.config;
    const identity = this.resolve(ctx, entry.base);
    const label = identity ? formatCallsign(identity.call) : entry.base;

    if (isExcluded(label, cfg.exclude)) return this.exclude(ctx, entry, label, "excluded", "on the exclusion list");
    if (!identity) {
      return this.exclude(ctx, entry, label, "unroutable", new UnroutableTargetError(label, "no SSID has been observed").message);
    }
    if (cfg.mode === "new-only" && ctx.priorCrawled.has(entry.base)) {
      return this.exclude(ctx, entry, label, "known_in_graph", "already crawled in the existing graph");
    }
    const heard = ctx.graph.lastHeard(entry.base);
    if (entry.base !== ctx.start.base && cfg.stale_after_ms > 0 && heard !== undefined) {
      const age = this.now() - heard;
      if (age > cfg.stale_after_ms) return this.exclude(ctx, entry, label, "stale", new StaleNodeError(label, age).message);
    }

    const plan = this.nextPath(ctx, entry);
    if (!plan) {
      ctx.frontier.park(entry);
      this.logger.debug("no untried path", { node: label, attempts: entry.attempts });
      return "parked";
    }

    ctx.frontier.attempting(entry);
    entry.attempts++;
    entry.tried.add(plan.key);
    ctx.summary.attempt();
    const route = plan.hops.map((h) => h.call);
    this.logger.info("attempting node", { node: label, attempt: entry.attempts, path: route });
    await this.emit(ctx, "node.attempting", { node: label, attempt: entry.attempts, path: route });

    const result = await this.attempt(ctx, plan.hops, signal);
    switch (result.status) {
      case "aborted":
        ctx.frontier.release(entry);
        return "aborted";
      case "auth_failed":
        return this.exclude(ctx, entry, label, "auth_failure", result.detail);
      case "failed":
        this.logger.warn("node attempt failed", { node: label, attempt: entry.attempts, detail: result.detail });
        await this.emit(ctx, "node.failed", { node: label, attempt: entry.attempts, detail: result.detail });
        if (entry.attempts >= cfg.max_attempts) {
          return this.exclude(ctx, entry, label, "exhausted_paths", `${entry.attempts} attempt(s) failed, last: ${result.detail}`);
        }
        ctx.frontier.release(entry);
        return "failed";
      case "ok":
        await this.commit(ctx, entry, identity, plan.hops, result.observation);
        return "visited";
    }
  }

  private nextPath(ctx: CrawlContext, entry: FrontierEntry): PlannedPath | null {
    if (entry.base === ctx.local.base) return entry.tried.has("local") ? null : { key: "local", hops: [] };
    let candidates = planPaths(this.adjacency(ctx), ctx.local.base, entry.base, { maxCandidates: this.config.max_attempts });
    if (candidates.length === 0 && entry.base === ctx.start.base) {
      // the operator named the start node; try a routed connect to it
      candidates = [{ nodes: [ctx.local.base, entry.base], hops: 1, via: ctx.local.base }];
    }
    for (const candidate of candidates) {
      const key = candidate.nodes.join(">");
      if (entry.tried.has(key)) continue;
      const hops = this.toHops(ctx, candidate.nodes);
      if (hops) return { key, hops };
    }
    return null;
  }

  /** Only the first hop out of the local node may name a radio port. */
  private toHops(ctx: CrawlContext, nodes: readonly string[]): HopSpec[] | null {
    const hops: HopSpec[] = [];
    for (let i = 1; i < nodes.length; i++) {
      const base = nodes[i]!;
      const call = this.idOf(ctx, base);
      if (call === null) return null;
      const port = i === 1 ? ctx.graph.portFor(ctx.local.base, base) : undefined;
      hops.push(port === undefined ? { kind: "routed", call } : { kind: "port", port, call });
    }
    return hops;
  }

  private async attempt(ctx: CrawlContext, hops: HopSpec[], signal?: AbortSignal): Promise<AttemptResult> {
    let link: TerminalLink;
    try {
      link = await this.openLink();
    } catch (err) {
      return { status: "failed", detail: `cannot open link to local node: ${errorMessage(err)}` };
    }

    const retries: Array<{ command: string; attempt: number }> = [];
    const session = new SessionManager({
      ...this.sessionOptions,
      link,
      logger: this.logger,
      credentials: this.credentials,
      commandRetries: this.config.command_retries,
      onRetry: (command, attempt) => {
        retries.push({ command, attempt });
      },
    });

    try {
      const opened = await session.open();
      if (opened.status === "auth_failed") return { status: "auth_failed", detail: opened.detail };
      if (opened.status !== "connected") return { status: "failed", detail: opened.detail };

      const path = await session.executePath(hops, signal);
      for (const report of path.hops) {
        await this.emit(ctx, report.status === "connected" ? "hop.connected" : "hop.failed", {
          call: report.hop.call, status: report.status, detail: report.detail, elapsed_ms: report.elapsed_ms,
        });
      }
      if (path.status === "aborted") return { status: "aborted" };
      if (path.status === "failed") {
        const last = path.hops[path.hops.length - 1];
        return { status: "failed", detail: last ? `${last.hop.call} ${last.status}: ${last.detail}` : "path failed" };
      }

      const collected = await collectNode(session, signal);
      ctx.summary.countCommands(collected.outcomes);
      for (const retry of retries) await this.emit(ctx, "command.retried", { ...retry });
      if (collected.status === "aborted") return { status: "aborted" };
      if (collected.status === "failed") {
        const { failed } = collected;
        const detail = failed.status === "parse_error"
          ? new ProtocolParseError(failed.command, failed.attempts).message
          : `${failed.command} ${failed.status.replace("_", " ")}`;
        return { status: "failed", detail };
      }
      return { status: "ok", observation: collected.observation };
    } finally {
      await session.close();
    }
  }

  /** Fold a successful visit into the working graph and grow the frontier. */
  private async commit(
    ctx: CrawlContext, entry: FrontierEntry, identity: IdentityResolution, hops: readonly HopSpec[], obs: NodeObservation,
  ): Promise<void> {
    const now = this.now();
    const base = entry.base;
    const { graph } = ctx;

    if (base === ctx.local.base && obs.banner && obs.banner.call.base === base) ctx.local = obs.banner.call;
    const id = base === ctx.local.base ? formatCallsign(ctx.local) : formatCallsign(identity.call);
    ctx.reached.set(base, id);
    if (hops.length === 1) ctx.approaches.push({ from: ctx.local.base, to: base, quality: null });

    const rec = graph.record(base);
    rec.node_type = obs.node_type;
    rec.ports = obs.ports;
    rec.commands = obs.commands;
    rec.last_crawled = new Date(now).toISOString();
    if (obs.info) {
      rec.location = obs.info.location;
      rec.applications = obs.info.applications;
    }
    if (ctx.pinned.has(base) && identity.source === "forced") rec.forced_ssid = identity.call.ssid;

    if (obs.banner) {
      this.advertise(ctx, obs.banner.call);
      graph.setAlias(obs.banner.call.base, obs.banner.alias, formatCallsign(obs.banner.call), "advertised");
    }
    for (const a of obs.nodes.records) graph.setAlias(a.call.base, a.alias, formatCallsign(a.call), "nodes");

    ctx.evidence.recordRoutes(base, obs.routes.records);
    ctx.evidence.recordNodes(base, obs.nodes.records);
    for (const heard of obs.mheard) ctx.evidence.recordMheard(base, heard.records);

    const portInfo = new Map(obs.ports.map((p) => [p.number, p]));
    const link = (port: number, quality: number | null): EdgeObservation => {
      const info = portInfo.get(port);
      const observation: EdgeObservation = { port, quality, link_class: info?.link_class ?? "rf" };
      if (info?.frequency_mhz !== undefined) observation.frequency_mhz = info.frequency_mhz;
      return observation;
    };

    const neighbors = new Set<string>();
    const targets = new Set<string>();
    for (const route of obs.routes.records) {
      graph.observe(base, route.call.base, link(route.port, route.quality), id);
      neighbors.add(route.call.base);
      targets.add(route.call.base);
    }
    for (const heard of obs.mheard) {
      for (const h of heard.records) {
        graph.observe(base, h.call.base, link(h.port, null), id);
        if (h.age_ms !== undefined) graph.heard(h.call.base, now - h.age_ms);
        neighbors.add(h.call.base);
        // heard-only links are usable from the local node alone
        if (base === ctx.local.base) targets.add(h.call.base);
      }
    }
    neighbors.delete(base);
    targets.delete(base);
    rec.neighbors = [...neighbors].sort();
    for (const nb of neighbors) {
      const other = graph.record(nb);
      if (!other.seen_by.includes(id)) other.seen_by = [...other.seen_by, id];
    }
    for (const target of targets) {
      if (ctx.frontier.add(target)) this.logger.debug("discovered node", { node: target, via: id });
    }

    const rejected: Array<[string, RejectedEntry]> = [
      ...obs.routes.rejected.map((r): [string, RejectedEntry] => ["ROUTES", r]),
      ...obs.nodes.rejected.map((r): [string, RejectedEntry] => ["NODES", r]),
      ...obs.mheard.flatMap((m) => m.rejected.map((r): [string, RejectedEntry] => ["MHEARD", r])),
    ];
    for (const [command, r] of rejected) await this.reject(ctx, r, command, id);

    ctx.frontier.visited(entry);
    ctx.frontier.unparkAll();
    ctx.visited.push(id);
    ctx.summary.visit(id);
    this.logger.info("visited node", { node: id, type: obs.node_type, neighbors: rec.neighbors.length });
    await this.emit(ctx, "node.visited", {
      node: id, node_type: obs.node_type, neighbors: rec.neighbors.length, routes: obs.routes.records.length,
    });
  }

  /** Log a table entry that can never be a crawl target, unless a valid SSID is known for its base. */
  private async reject(ctx: CrawlContext, entry: RejectedEntry, command: string, observer: string): Promise<void> {
    if (ctx.evidence.get(baseOf(entry.token)).length > 0) return;
    const detail = `${entry.reason.replace(/_/g, " ")} in ${command} at ${observer}`;
    if (!ctx.summary.skip(entry.token, "invalid_ssid", detail)) return;
    this.logger.warn("rejected crawl target", { token: entry.token, reason: entry.reason, command, observer });
    await this.emit(ctx, "node.excluded", { node: entry.token, reason: "invalid_ssid", detail });
  }

  private async exclude(
    ctx: CrawlContext, entry: FrontierEntry, label: string, reason: SkipReason, detail: string,
  ): Promise<VisitOutcome> {
    ctx.frontier.excluded(entry);
    ctx.summary.skip(label, reason, detail);
    this.logger.info("node excluded", { node: label, reason, detail });
    await this.emit(ctx, "node.excluded", { node: label, reason, detail });
    return "excluded";
  }

  // ─── Wrap-up ────────────────────────────────────────────────────

  /** Give every node left in the frontier a reason in the summary. */
  private async settle(ctx: CrawlContext, interrupted: boolean): Promise<void> {
    const maxHops = this.config.max_hops;
    const distances = hopDistance(this.adjacency(ctx), ctx.start.base);
    for (const entry of ctx.frontier.pending()) {
      const label = this.idOf(ctx, entry.base) ?? entry.base;
      const d = distances.get(entry.base);
      let reason: SkipReason;
      let detail: string;
      if (interrupted) {
        reason = "interrupted";
        detail = "crawl stopped before this node was visited";
      } else if (d !== undefined && d > maxHops) {
        reason = "hop_limit";
        detail = `${d} hops from ${ctx.startId}, limit ${maxHops}`;
      } else if (entry.attempts > 0) {
        reason = "exhausted_paths";
        detail = `${entry.attempts} attempt(s), no untried path left`;
      } else {
        reason = "unroutable";
        detail = new UnroutableTargetError(label, "no traversable path from the local node").message;
      }
      if (ctx.summary.skip(label, reason, detail)) await this.emit(ctx, "node.excluded", { node: label, reason, detail });
    }
  }

  private async finish(ctx: CrawlContext, store: GraphStore, partial: GraphStore, interrupted: boolean): Promise<CrawlResult> {
    const cfg = this.config;
    const finishedAt = this.iso();
    const delta = ctx.graph.toDelta((base) => this.idOf(ctx, base));
    let document = applySession(ctx.prior ?? emptyDocument({}, finishedAt), delta);
    document = {
      ...document,
      generated_at: finishedAt,
      meta: {
        ...document.meta,
        crawl_id: ctx.crawlId,
        start_node: ctx.startId,
        mode: cfg.mode,
        write_mode: cfg.write_mode,
        complete: !interrupted,
        visited: sortedUnion(ctx.resumed, ctx.visited),
      },
    };

    if (!interrupted && cfg.merge_inputs.length > 0) {
      const inputs: MergeInput[] = [];
      for (const path of cfg.merge_inputs) {
        const doc = await new GraphStore(path, this.logger).load();
        if (doc) inputs.push({ path, document: doc });
        else this.logger.warn("merge input not found", { path });
      }
      const merged = mergeDocuments(document, inputs, { outputPath: cfg.output_path, logger: this.logger, generatedAt: finishedAt });
      for (const err of merged.rejected) {
        ctx.summary.skip(err.path, "self_merge", err.message);
        await this.emit(ctx, "merge.rejected", { path: err.path, detail: err.message });
      }
      document = merged.document;
    }

    const target = interrupted ? partial : store;
    await target.save(document);
    if (!interrupted) {
      await rm(partial.filePath, { force: true });
      if (cfg.csv_path) await writeFile(cfg.csv_path, exportCsv(document, { exclude: cfg.exclude }), "utf-8");
    }
    this.logger.info(interrupted ? "partial graph saved" : "graph saved", {
      path: target.filePath, nodes: document.meta.total_nodes, edges: document.meta.total_edges,
    });
    await this.emit(ctx, "graph.saved", {
      path: target.filePath, nodes: document.meta.total_nodes, edges: document.meta.total_edges, complete: !interrupted,
    });

    const summary = ctx.summary.build(finishedAt, interrupted);
    await this.emit(ctx, interrupted ? "crawl.interrupted" : "crawl.completed", {
      visited: summary.visited.length, skipped: summary.skipped.length, attempts: summary.attempts,
    });
    return { document, path: target.filePath, summary };
  }

  // ─── Helpers ────────────────────────────────────────────────────

  private resolve(ctx: CrawlContext, base: string): IdentityResolution | null {
    if (base === ctx.local.base) return { call: ctx.local, source: "forced", confidence: "high" };
    const rctx: ResolveContext = { policy: this.config.tie_break };
    const forced = ctx.forced.get(base);
    if (forced !== undefined) rctx.forced = forced;
    const advertised = ctx.advertised.get(base);
    if (advertised) rctx.advertised = [...advertised].sort((a, b) => a - b);
    return resolveIdentity(base, ctx.evidence.get(base), rctx);
  }

  /** Canonical id for a base: as reached when visited, otherwise as resolved now. */
  private idOf(ctx: CrawlContext, base: string): string | null {
    if (base === ctx.local.base) return formatCallsign(ctx.local);
    const reached = ctx.reached.get(base);
    if (reached) return reached;
    const resolved = this.resolve(ctx, base);
    return resolved ? formatCallsign(resolved.call) : null;
  }

  private advertise(ctx: CrawlContext, call: Callsign): void {
    const set = ctx.advertised.get(call.base);
    if (set) set.add(call.ssid);
    else ctx.advertised.set(call.base, new Set([call.ssid]));
  }

  private adjacency(ctx: CrawlContext): Adjacency {
    return buildAdjacency([...ctx.graph.planEdges(), ...ctx.approaches], { allowUnratedFrom: ctx.local.base });
  }

  private iso(): string {
    return new Date(this.now()).toISOString();
  }

  private async emit(ctx: CrawlContext, type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.journal?.tryEmit(ctx.crawlId, type, payload);
  }
}
