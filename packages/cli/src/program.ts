import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import type { CrawlConfig, GraphDocument, LinkClass, Logger, NodeType } from "@pktmap/schemas";
import { PktmapError } from "@pktmap/schemas";
import { ConsoleLogger, Journal } from "@pktmap/journal";
import { TelnetLink, computeTimeouts, type CredentialSource, type TerminalLink } from "@pktmap/session";
import { Crawler, formatRunSummary, type CrawlerOptions } from "@pktmap/crawler";
import {
  GraphStore, exportCsv, formatSummaryTable, mergeDocuments, queryNodes, type MergeInput,
} from "@pktmap/graph";
import {
  DEFAULTS, configFromEnv, configFromFlags, loadConfigFile, parseInteger, resolveConfig, resolveViewSettings,
  type CrawlFlags, type ViewSettings,
} from "./config.js";
import { configFromBpq, readBpqConfig } from "./bpq-config.js";
import { createCredentialPrompt } from "./prompt.js";

const NODE_TYPES: readonly NodeType[] = ["BPQ", "FBB", "JNOS", "XRouter", "Unknown"];
const LINK_CLASSES: readonly LinkClass[] = ["rf", "hf", "ip"];

export interface ProgramDeps {
  env: NodeJS.ProcessEnv;
  print: (text: string) => void;
  /** Factory for the link to the local node. Defaults to telnet. */
  openLink?: (config: CrawlConfig, logger: Logger) => () => Promise<TerminalLink>;
  logger?: (config: CrawlConfig) => Logger;
  /** Interactive prompt for missing credentials; omitted when stdin is not a terminal. */
  credentials?: (config: CrawlConfig) => CredentialSource;
  sleep?: (ms: number) => Promise<void>;
  session?: CrawlerOptions["session"];
  /** Where SIGINT is hooked; returns the unhook function. */
  onInterrupt?: (handler: () => void) => () => void;
}

function telnetLink(config: CrawlConfig, logger: Logger): () => Promise<TerminalLink> {
  return () => TelnetLink.open(config.host, config.port, computeTimeouts(0).connectMs, logger);
}

function hookSigint(handler: () => void): () => void {
  process.once("SIGINT", handler);
  return () => {
    process.removeListener("SIGINT", handler);
  };
}

export function defaultDeps(): ProgramDeps {
  return {
    env: process.env,
    print: (text) => console.log(text),
    credentials: (config) =>
      process.stdin.isTTY ? createCredentialPrompt(config.credentials) : config.credentials,
    onInterrupt: hookSigint,
  };
}

async function loadDocument(path: string): Promise<GraphDocument> {
  const doc = await new GraphStore(path).load();
  if (!doc) throw new PktmapError("invalid_document", `No graph at ${path}`);
  return doc;
}

function pickNodeType(value: string | undefined): NodeType | undefined {
  if (value === undefined) return undefined;
  const type = NODE_TYPES.find((t) => t.toUpperCase() === value.toUpperCase());
  if (!type) throw new PktmapError("invalid_config", `Invalid --type "${value}" (one of ${NODE_TYPES.join(", ")})`);
  return type;
}

function pickLinkClass(value: string | undefined): LinkClass | undefined {
  if (value === undefined) return undefined;
  const cls = LINK_CLASSES.find((c) => c === value.toLowerCase());
  if (!cls) throw new PktmapError("invalid_config", `Invalid --link "${value}" (one of ${LINK_CLASSES.join(", ")})`);
  return cls;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export interface CrawlCommandOptions extends CrawlFlags {
  config?: string;
  bpqConfig?: string;
}

interface ViewOptions {
  file?: string;
  config?: string;
  exclude?: string[];
}

/** Graph path and exclusions for the read-only commands, layered like `crawl`'s. */
async function buildViewSettings(opts: ViewOptions): Promise<ViewSettings> {
  const file = await loadConfigFile(opts.config);
  return resolveViewSettings([file, configFromFlags(undefined, undefined, { exclude: opts.exclude, output: opts.file })]);
}

/** Layer defaults, config file, bpq32.cfg, environment and flags into one config. */
export async function buildCrawlConfig(
  maxHops: string | undefined,
  startNode: string | undefined,
  opts: CrawlCommandOptions,
  env: NodeJS.ProcessEnv,
): Promise<CrawlConfig> {
  const file = await loadConfigFile(opts.config);
  const bpq = opts.bpqConfig ? configFromBpq(await readBpqConfig(opts.bpqConfig)) : {};
  return resolveConfig([DEFAULTS, file, bpq, configFromEnv(env), configFromFlags(maxHops, startNode, opts)]);
}

export function buildProgram(deps: ProgramDeps = defaultDeps()): Command {
  const program = new Command();
  program.name("pktmap").description("Packet radio network topology crawler").version("0.1.0");

  program.command("crawl").description("Crawl the network outward from a node")
    .argument("[maxHops]", "Maximum hops from the start node")
    .argument("[startNode]", "Node to start from (defaults to the local node)")
    .option("--mode <mode>", "Crawl mode: update, reaudit, new-only")
    .option("--exclude <calls...>", "Callsigns to skip (a bare base skips every SSID)")
    .option("--force <call>", "Pin a node's SSID, e.g. N1ALF-15 (repeatable)", collect, [])
    .option("--merge <files...>", "Merge other perspectives into the result")
    .option("--overwrite", "Replace the output instead of merging into it")
    .option("--user <name>", "Login name at the local node")
    .option("--pass <password>", "Login password at the local node")
    .option("--debug", "Debug logging")
    .option("--log-level <level>", "Log level: debug, info, warn, error")
    .option("--config <file>", "YAML config file (default pktmap.yaml)")
    .option("--bpq-config <file>", "Read node callsign and telnet port from bpq32.cfg")
    .option("--output <file>", "Graph document to write")
    .option("--csv <file>", "Also write the edge list as CSV")
    .option("--no-csv", "Do not write CSV")
    .option("--journal <file>", "Append crawl events to a JSONL journal")
    .option("--host <host>", "Telnet host of the local node")
    .option("--port <port>", "Telnet port of the local node")
    .option("--callsign <call>", "Local node callsign")
    .option("--delay <seconds>", "Pause between nodes")
    .option("--retries <n>", "Retries per command on unusable output")
    .option("--attempts <n>", "Paths tried per node before giving up")
    .option("--stale-hours <n>", "Skip nodes not heard for this long (0 disables)")
    .action(async (maxHops: string | undefined, startNode: string | undefined, opts: CrawlCommandOptions) => {
      const config = await buildCrawlConfig(maxHops, startNode, opts, deps.env);
      const logger = deps.logger ? deps.logger(config) : new ConsoleLogger("pktmap", config.log_level);

      let journal: Journal | undefined;
      if (config.journal_path) {
        journal = new Journal(config.journal_path, { logger });
        await journal.init();
      }

      const controller = new AbortController();
      const unhook = deps.onInterrupt?.(() => {
        logger.warn("interrupt received, stopping after the current step");
        controller.abort();
      });

      const openLink = deps.openLink ?? telnetLink;
      const crawler = new Crawler({
        config,
        openLink: openLink(config, logger),
        logger,
        journal,
        credentials: deps.credentials?.(config),
        sleep: deps.sleep,
        session: deps.session,
      });
      try {
        const result = await crawler.run(controller.signal);
        deps.print(formatRunSummary(result.summary));
        deps.print(`Graph written to ${result.path}`);
        if (result.summary.interrupted) process.exitCode = 130;
      } finally {
        unhook?.();
        await journal?.close();
      }
    });

  program.command("merge").description("Merge graph documents into one")
    .argument("<inputs...>", "Graph documents to merge")
    .requiredOption("--output <file>", "Document to merge into and write")
    .option("--strict", "Fail when an input is the output itself")
    .action(async (inputs: string[], opts: { output: string; strict?: boolean }) => {
      const store = new GraphStore(opts.output);
      const base = await store.load();
      const docs: MergeInput[] = [];
      for (const path of inputs) docs.push({ path, document: await loadDocument(path) });
      const result = mergeDocuments(base, docs, { outputPath: opts.output, strict: opts.strict });
      await store.save(result.document);
      for (const err of result.rejected) deps.print(`Skipped ${err.message}`);
      deps.print(`Merged ${result.merged.length} document(s) into ${opts.output}: ` +
        `${result.document.meta.total_nodes} nodes, ${result.document.meta.total_edges} links`);
    });

  program.command("query").description("List nodes matching a callsign or alias")
    .argument("[pattern]", "Substring of a callsign or alias")
    .option("--file <file>", `Graph document (default ${DEFAULTS.output_path})`)
    .option("--config <file>", "YAML config file (default pktmap.yaml)")
    .option("--type <type>", `Node type: ${NODE_TYPES.join(", ")}`)
    .option("--link <class>", "Only nodes with a port of this class: rf, hf, ip")
    .option("--exclude <calls...>", "Callsigns to hide")
    .action(async (pattern: string | undefined, opts: ViewOptions & { type?: string; link?: string }) => {
      const view = await buildViewSettings(opts);
      const doc = await loadDocument(view.output_path);
      const nodes = queryNodes(doc, {
        pattern,
        type: pickNodeType(opts.type),
        linkClass: pickLinkClass(opts.link),
        exclude: view.exclude,
      });
      for (const n of nodes) {
        const aliases = Object.keys(n.aliases).sort().join(",") || "-";
        deps.print(`${n.call}  ${n.node_type}  ${n.location.grid ?? "-"}  ${aliases}  ${n.neighbors.join(" ") || "-"}`);
      }
      deps.print(`${nodes.length} node(s)`);
    });

  program.command("show").description("Summary table of a graph document")
    .option("--file <file>", `Graph document (default ${DEFAULTS.output_path})`)
    .option("--config <file>", "YAML config file (default pktmap.yaml)")
    .option("--exclude <calls...>", "Callsigns to hide")
    .action(async (opts: ViewOptions) => {
      const view = await buildViewSettings(opts);
      const doc = await loadDocument(view.output_path);
      deps.print(formatSummaryTable(doc, { exclude: view.exclude }));
    });

  program.command("export-csv").description("Write the edge list of a graph document as CSV")
    .option("--file <file>", `Graph document (default ${DEFAULTS.output_path})`)
    .option("--config <file>", "YAML config file (default pktmap.yaml)")
    .option("--out <file>", "CSV file to write (stdout when omitted)")
    .option("--exclude <calls...>", "Callsigns to leave out")
    .option("--include-blocked", "Keep links the sysop rated 0")
    .action(async (opts: ViewOptions & { out?: string; includeBlocked?: boolean }) => {
      const view = await buildViewSettings(opts);
      const doc = await loadDocument(view.output_path);
      const csv = exportCsv(doc, { includeBlocked: opts.includeBlocked, exclude: view.exclude });
      if (opts.out) {
        await writeFile(opts.out, csv, "utf-8");
        deps.print(`Wrote ${opts.out}`);
      } else {
        deps.print(csv);
      }
    });

  program.command("journal").description("Print the events of a crawl journal")
    .argument("<file>", "Journal file")
    .argument("[crawlId]", "Only this crawl's events")
    .option("--limit <n>", "Only the most recent n events (without a crawl id)")
    .action(async (file: string, crawlId: string | undefined, opts: { limit?: string }) => {
      // read without init: init would cut a broken chain before it is reported
      const journal = new Journal(file);
      const limit = opts.limit === undefined ? undefined : parseInteger(opts.limit, "limit", 1);
      const events = crawlId ? await journal.readCrawl(crawlId) : await journal.readAll({ limit });
      if (events.length === 0) deps.print(crawlId ? `No events for crawl ${crawlId}` : "No events");
      for (const event of events) {
        const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
        const payload = Object.keys(event.payload).length > 0 ? `  ${JSON.stringify(event.payload)}` : "";
        deps.print(`[${ts}] ${event.type}${payload}`);
      }
      const integrity = await journal.verifyIntegrity();
      deps.print(`Journal integrity: ${integrity.valid ? "OK" : `broken at line ${(integrity.brokenAt ?? 0) + 1}`}`);
    });

  return program;
}
