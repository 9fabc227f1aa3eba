import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import {
  PktmapError, isCrawlConfig, validateCrawlConfigData,
  type CrawlConfig, type Credentials,
} from "@pktmap/schemas";
import { parseCallsignToken } from "@pktmap/parsers";

/** One source of settings, keyed like CrawlConfig. Later layers win. */
export type ConfigLayer = Record<string, unknown>;

export const DEFAULTS: Omit<CrawlConfig, "local_node" | "start_node"> = {
  host: "localhost",
  port: 8010,
  max_hops: 10,
  mode: "update",
  exclude: [],
  force_ssid: {},
  merge_inputs: [],
  output_path: "nodemap.json",
  csv_path: "nodemap.csv",
  write_mode: "merge",
  credentials: {},
  log_level: "info",
  stale_after_ms: 24 * 3_600_000,
  tie_break: "most_recent",
  command_retries: 2,
  max_attempts: 3,
  node_delay_ms: 2_000,
  journal_path: null,
};

export const DEFAULT_CONFIG_FILE = "pktmap.yaml";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function parseInteger(value: string, label: string, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const n = Number(value.trim());
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new PktmapError("invalid_config", `Invalid ${label}: "${value}" (must be an integer ${min}–${max})`);
  }
  return n;
}

export function parsePort(value: string, label = "port"): number {
  return parseInteger(value, label, 1, 65535);
}

export function parseConfigYaml(text: string, source: string): ConfigLayer {
  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (err) {
    throw new PktmapError("invalid_config", `${source}: ${errorMessage(err)}`);
  }
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) throw new PktmapError("invalid_config", `${source}: expected a mapping at the top level`);
  return data;
}

/**
 * Read a YAML config file. A missing file is only an error when the user
 * named it; the default location is optional.
 */
export async function loadConfigFile(path: string | undefined): Promise<ConfigLayer> {
  const file = path ?? DEFAULT_CONFIG_FILE;
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    if (path === undefined && isNotFound(err)) return {};
    throw new PktmapError("invalid_config", `Cannot read config file ${file}: ${errorMessage(err)}`);
  }
  return parseConfigYaml(text, file);
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  if (env.PKTMAP_HOST) layer.host = env.PKTMAP_HOST;
  if (env.PKTMAP_PORT) layer.port = parsePort(env.PKTMAP_PORT, "PKTMAP_PORT");
  if (env.PKTMAP_CALLSIGN) layer.local_node = env.PKTMAP_CALLSIGN.trim().toUpperCase();
  if (env.PKTMAP_LOG_LEVEL) layer.log_level = env.PKTMAP_LOG_LEVEL;
  if (env.PKTMAP_JOURNAL_PATH) layer.journal_path = env.PKTMAP_JOURNAL_PATH;
  const credentials: Credentials = {};
  if (env.PKTMAP_USER) credentials.username = env.PKTMAP_USER;
  if (env.PKTMAP_PASS) credentials.password = env.PKTMAP_PASS;
  if (credentials.username !== undefined || credentials.password !== undefined) layer.credentials = credentials;
  return layer;
}

/** `N1ALF-15` → `{ N1ALF: 15 }`, for pinning the SSID a base is connected on. */
export function parseForcedSsids(tokens: readonly string[]): Record<string, number> {
  const forced: Record<string, number> = {};
  for (const token of tokens) {
    const parsed = parseCallsignToken(token.trim().toUpperCase());
    if (!parsed.ok) {
      throw new PktmapError("invalid_config", `Invalid --force value "${token}": ${parsed.reason.replace(/_/g, " ")}`);
    }
    forced[parsed.call.base] = parsed.call.ssid;
  }
  return forced;
}

/** `["n1brv,n1chr-3"]` → `["N1BRV", "N1CHR-3"]` */
export function parseExclusions(values: readonly string[]): string[] {
  return values
    .flatMap((v) => v.split(","))
    .map((v) => v.trim().toUpperCase())
    .filter((v) => v.length > 0);
}

export interface CrawlFlags {
  mode?: string;
  exclude?: string[];
  force?: string[];
  merge?: string[];
  overwrite?: boolean;
  user?: string;
  pass?: string;
  debug?: boolean;
  logLevel?: string;
  output?: string;
  csv?: string | boolean;
  journal?: string;
  host?: string;
  port?: string;
  callsign?: string;
  delay?: string;
  retries?: string;
  attempts?: string;
  staleHours?: string;
}

/** Command-line flags and positionals of `crawl` as a config layer. */
export function configFromFlags(maxHops: string | undefined, startNode: string | undefined, flags: CrawlFlags): ConfigLayer {
  const layer: ConfigLayer = {};
  if (maxHops !== undefined) layer.max_hops = parseInteger(maxHops, "max hops", 0, 50);
  if (startNode) layer.start_node = startNode.trim().toUpperCase();
  if (flags.mode) layer.mode = flags.mode;
  if (flags.exclude && flags.exclude.length > 0) layer.exclude = parseExclusions(flags.exclude);
  if (flags.force && flags.force.length > 0) layer.force_ssid = parseForcedSsids(flags.force);
  if (flags.merge && flags.merge.length > 0) layer.merge_inputs = [...flags.merge];
  if (flags.overwrite) layer.write_mode = "overwrite";
  const credentials: Credentials = {};
  if (flags.user) credentials.username = flags.user;
  if (flags.pass) credentials.password = flags.pass;
  if (credentials.username !== undefined || credentials.password !== undefined) layer.credentials = credentials;
  if (flags.logLevel) layer.log_level = flags.logLevel;
  if (flags.debug) layer.log_level = "debug";
  if (flags.output) layer.output_path = flags.output;
  if (typeof flags.csv === "string") layer.csv_path = flags.csv;
  else if (flags.csv === false) layer.csv_path = null;
  if (flags.journal) layer.journal_path = flags.journal;
  if (flags.host) layer.host = flags.host;
  if (flags.port) layer.port = parsePort(flags.port);
  if (flags.callsign) layer.local_node = flags.callsign.trim().toUpperCase();
  if (flags.delay !== undefined) layer.node_delay_ms = parseInteger(flags.delay, "delay") * 1000;
  if (flags.retries !== undefined) layer.command_retries = parseInteger(flags.retries, "retries", 0, 10);
  if (flags.attempts !== undefined) layer.max_attempts = parseInteger(flags.attempts, "attempts", 1, 20);
  if (flags.staleHours !== undefined) layer.stale_after_ms = parseInteger(flags.staleHours, "stale hours") * 3_600_000;
  return layer;
}

/**
 * Fold layers over each other, fill in derived values and validate the
 * result. Credentials merge field by field so a password from the
 * environment survives a username given on the command line.
 */
export function resolveConfig(layers: ReadonlyArray<object>): CrawlConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const prev = merged[key];
      merged[key] = key === "credentials" && isRecord(prev) && isRecord(value) ? { ...prev, ...value } : value;
    }
  }

  if (typeof merged.local_node === "string") merged.local_node = merged.local_node.toUpperCase();
  if (merged.local_node === undefined || merged.local_node === "") {
    throw new PktmapError(
      "invalid_config",
      "Local node callsign is unknown: set PKTMAP_CALLSIGN, local_node in the config file, --callsign or --bpq-config",
    );
  }
  if (merged.start_node === undefined || merged.start_node === "") merged.start_node = merged.local_node;
  else if (typeof merged.start_node === "string") merged.start_node = merged.start_node.toUpperCase();

  if (!isCrawlConfig(merged)) {
    const { errors } = validateCrawlConfigData(merged);
    throw new PktmapError("invalid_config", `Invalid configuration: ${errors.join("; ")}`);
  }
  return Object.freeze(merged);
}


/** The settings `query`, `show` and `export-csv` share with `crawl`. */
export interface ViewSettings {
  output_path: string;
  exclude: string[];
}

/**
 * Fold the layers the read-only commands care about. Unlike `resolveConfig`
 * this needs no local callsign, so a map can be read on any machine.
 */
export function resolveViewSettings(layers: ReadonlyArray<ConfigLayer>): ViewSettings {
  const settings: ViewSettings = { output_path: DEFAULTS.output_path, exclude: [...DEFAULTS.exclude] };
  for (const layer of layers) {
    const { output_path: path, exclude } = layer;
    if (path !== undefined) {
      if (typeof path !== "string" || path.length === 0) {
        throw new PktmapError("invalid_config", "Invalid configuration: /output_path must be a non-empty string");
      }
      settings.output_path = path;
    }
    if (exclude !== undefined) {
      if (!isStringArray(exclude)) {
        throw new PktmapError("invalid_config", "Invalid configuration: /exclude must be a list of callsigns");
      }
      settings.exclude = parseExclusions(exclude);
    }
  }
  return settings;
}
