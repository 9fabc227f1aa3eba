import type { CommandOutcome, NodeType, PortInfo } from "@pktmap/schemas";
import {
  detectNodeType, isPlausible, parseCommands, parseInfo, parseMheard, parseNodes, parsePorts, parseRoutes,
  type Banner, type InfoResult, type MheardResult, type NodesResult, type RoutesResult,
} from "@pktmap/parsers";
import type { SessionManager } from "@pktmap/session";

/** Everything read from one node during a successful visit. */
export interface NodeObservation {
  banner: Banner | null;
  node_type: NodeType;
  ports: PortInfo[];
  routes: RoutesResult;
  nodes: NodesResult;
  mheard: MheardResult[];
  info: InfoResult | null;
  commands: string[];
}

export type CollectResult =
  | { status: "ok"; observation: NodeObservation; outcomes: CommandOutcome[] }
  | { status: "failed"; failed: CommandOutcome; outcomes: CommandOutcome[] }
  | { status: "aborted"; outcomes: CommandOutcome[] };

function hasText(text: string): boolean {
  return text.trim().length > 0;
}

/**
 * Run the command set at the node a session is connected to. PORTS, NODES
 * and ROUTES are required: if any of them never yields a plausible response
 * the visit fails and nothing from it is kept. MHEARD per radio port, INFO
 * and the command list are best effort.
 */
export async function collectNode(session: SessionManager, signal?: AbortSignal): Promise<CollectResult> {
  const outcomes: CommandOutcome[] = [];
  const run = async (command: string, validate: (text: string) => boolean): Promise<CommandOutcome | null> => {
    if (signal?.aborted) return null;
    const outcome = await session.runCommand(command, validate);
    outcomes.push(outcome);
    return outcome;
  };

  const ports = await run("PORTS", (t) => isPlausible(parsePorts(t)));
  if (!ports) return { status: "aborted", outcomes };
  if (ports.status !== "ok") return { status: "failed", failed: ports, outcomes };
  const nodes = await run("NODES", (t) => isPlausible(parseNodes(t)));
  if (!nodes) return { status: "aborted", outcomes };
  if (nodes.status !== "ok") return { status: "failed", failed: nodes, outcomes };
  const routes = await run("ROUTES", (t) => isPlausible(parseRoutes(t)));
  if (!routes) return { status: "aborted", outcomes };
  if (routes.status !== "ok") return { status: "failed", failed: routes, outcomes };

  const portList = parsePorts(ports.text).records;
  const mheard: MheardResult[] = [];
  for (const port of portList) {
    if (port.link_class === "ip") continue;
    const heard = await run(`MHEARD ${port.number}`, (t) => isPlausible(parseMheard(t, port.number)));
    if (!heard) return { status: "aborted", outcomes };
    if (heard.status === "ok") mheard.push(parseMheard(heard.text, port.number));
  }

  const info = await run("INFO", hasText);
  if (!info) return { status: "aborted", outcomes };
  const help = await run("?", (t) => parseCommands(t).length > 0);
  if (!help) return { status: "aborted", outcomes };

  const routesResult = parseRoutes(routes.text);
  const nodesResult = parseNodes(nodes.text);
  const infoResult = info.status === "ok" ? parseInfo(info.text) : null;
  const banner = routesResult.banner ?? nodesResult.banner;
  return {
    status: "ok",
    observation: {
      banner,
      node_type: detectNodeType(infoResult?.text ?? "", banner !== null),
      ports: portList,
      routes: routesResult,
      nodes: nodesResult,
      mheard,
      info: infoResult,
      commands: help.status === "ok" ? parseCommands(help.text) : [],
    },
    outcomes,
  };
}
