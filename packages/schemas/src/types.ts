/**
 * pktmap Core Types
 *
 * Canonical data models shared by every package: the persisted graph
 * document, identity evidence, crawl configuration and the outcome values
 * threaded through the crawl loop.
 */

// ─── Callsigns ──────────────────────────────────────────────────────

export interface Callsign {
  /** Upper-case base callsign, e.g. "N1JMHX". */
  base: string;
  /** 0–15. */
  ssid: number;
}

export type NodeType = "BPQ" | "FBB" | "JNOS" | "XRouter" | "Unknown";

export type LinkClass = "rf" | "hf" | "ip";

// ─── Graph document ─────────────────────────────────────────────────

export interface PortInfo {
  number: number;
  description: string;
  frequency_mhz?: number;
  speed?: number;
  link_class: LinkClass;
}

export interface NodeLocation {
  grid?: string;
  lat?: number;
  lon?: number;
  city?: string;
  state?: string;
}

/**
 * How much an alias mapping can be trusted. `advertised` comes from the
 * node's own prompt banner, `nodes` from a NODES table, `mheard` from a
 * heard list, `forced` from the operator.
 */
export type AliasConfidence = "forced" | "advertised" | "nodes" | "mheard";

export interface AliasEntry {
  call: string;
  confidence: AliasConfidence;
}

export interface Application {
  name: string;
  description: string;
  call?: string;
}

export interface NodeRecord {
  call: string;
  node_type: NodeType;
  location: NodeLocation;
  ports: PortInfo[];
  aliases: Record<string, AliasEntry>;
  applications: Application[];
  commands: string[];
  neighbors: string[];
  note?: string;
  last_heard?: string;
  last_crawled?: string;
  forced_ssid?: number;
  seen_by: string[];
}

export interface EdgeRecord {
  from: string;
  to: string;
  ports: number[];
  /** Sysop route quality. 0 = blocked, null = heard but never routed. */
  quality: number | null;
  frequencies: number[];
  link_class: LinkClass;
  bidirectional: boolean;
  observed_by: string[];
}

export type WriteMode = "merge" | "overwrite";

export interface GraphMeta {
  crawl_id: string;
  start_node: string | null;
  mode: CrawlMode;
  write_mode: WriteMode;
  total_nodes: number;
  total_edges: number;
  /** False while a crawl was interrupted and can be resumed. */
  complete: boolean;
  /** Canonical ids visited by the crawl that produced this document. */
  visited: string[];
  sources: string[];
}

export interface GraphDocument {
  format_version: 2;
  generated_at: string;
  nodes: Record<string, NodeRecord>;
  edges: EdgeRecord[];
  meta: GraphMeta;
}

// ─── Identity evidence ──────────────────────────────────────────────

export type EvidenceSource = "routes" | "nodes" | "mheard" | "forced";

export interface RouteEvidence {
  base: string;
  ssid: number;
  source: EvidenceSource;
  /** Base callsign of the node whose table carried the observation. */
  observer: string;
  quality?: number;
  /** Monotonic observation order; higher is more recent. */
  seq: number;
}

export type TieBreakPolicy = "most_recent" | "lowest_ssid" | "highest_ssid";

// ─── Crawl configuration ────────────────────────────────────────────

export type CrawlMode = "update" | "reaudit" | "new-only";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Credentials {
  username?: string;
  password?: string;
}

export interface CrawlConfig {
  local_node: string;
  start_node: string;
  host: string;
  port: number;
  max_hops: number;
  mode: CrawlMode;
  exclude: string[];
  force_ssid: Record<string, number>;
  merge_inputs: string[];
  output_path: string;
  csv_path: string | null;
  write_mode: WriteMode;
  credentials: Credentials;
  log_level: LogLevel;
  /** 0 disables the staleness filter. */
  stale_after_ms: number;
  tie_break: TieBreakPolicy;
  command_retries: number;
  max_attempts: number;
  node_delay_ms: number;
  journal_path: string | null;
}

// ─── Session outcomes ───────────────────────────────────────────────

/**
 * One connect in a path. Only the first hop out of the local node can name
 * a radio port; every later hop is a routed connect by callsign.
 */
export type HopSpec =
  | { kind: "port"; port: number; call: string }
  | { kind: "routed"; call: string };

export type HopStatus = "connected" | "timed_out" | "rejected";

export interface HopReport {
  hop: HopSpec;
  status: HopStatus;
  detail: string;
  elapsed_ms: number;
}

export type CommandOutcome =
  | { status: "ok"; command: string; text: string; attempts: number }
  | { status: "timed_out" | "parse_error" | "link_lost"; command: string; text: string; attempts: number };

// ─── Run summary ────────────────────────────────────────────────────

export type SkipReason =
  | "excluded"
  | "stale"
  | "invalid_ssid"
  | "unroutable"
  | "hop_limit"
  | "auth_failure"
  | "exhausted_paths"
  | "known_in_graph"
  | "interrupted"
  | "self_merge";

export interface SkipEntry {
  node: string;
  reason: SkipReason;
  detail: string;
}

export interface RunSummary {
  crawl_id: string;
  started_at: string;
  finished_at: string;
  interrupted: boolean;
  visited: string[];
  skipped: SkipEntry[];
  attempts: number;
  commands: { ok: number; retried: number; failed: number };
}

// ─── Logging & journal ──────────────────────────────────────────────

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type JournalEventType =
  | "crawl.started"
  | "crawl.completed"
  | "crawl.interrupted"
  | "node.attempting"
  | "node.visited"
  | "node.excluded"
  | "node.failed"
  | "hop.connected"
  | "hop.failed"
  | "command.retried"
  | "graph.saved"
  | "merge.rejected";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  crawl_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}
