import type { TerminalLink } from "../link.js";

export type ConnectBehaviour = "connected" | "busy" | "failure" | "silent";

/** A reply body, successive replies (the last one repeats), or null for no answer. */
export type ScriptedReply = string | readonly string[] | null;

export interface ScriptedNode {
  alias: string;
  /** Upper-case command → reply body. The node's `ALIAS:CALL}` banner is prefixed. */
  responses: Record<string, ScriptedReply>;
}

export interface ScriptedNetworkConfig {
  /** Canonical id of the node the telnet session lands on. */
  local: string;
  nodes: Record<string, ScriptedNode>;
  /** Connect outcomes keyed `FROM>TO`; unlisted connects succeed when the target exists. */
  links?: Record<string, ConnectBehaviour>;
  login?: { username: string; password: string };
}

export interface ScriptedCommand {
  node: string;
  command: string;
}

export interface ScriptedConnect {
  from: string;
  to: string;
  outcome: ConnectBehaviour;
}

/**
 * In-process stand-in for a packet network reached through a node's telnet
 * port. Time is virtual: a read that finds nothing advances the clock by its
 * full timeout, so timeout paths run instantly.
 */
export class ScriptedNetwork {
  readonly commands: ScriptedCommand[] = [];
  readonly connects: ScriptedConnect[] = [];
  /** Connect commands exactly as sent, with the node that received each. */
  readonly dials: ScriptedCommand[] = [];
  sessions = 0;
  /** When set, writes never complete (a silently dead link). */
  stalled = false;
  private time = 0;
  private replyCounts = new Map<string, number>();

  constructor(readonly config: ScriptedNetworkConfig) {}

  readonly now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }

  open(): ScriptedLink {
    this.sessions++;
    return new ScriptedLink(this);
  }

  /** Commands run at one node, in order. */
  commandsAt(node: string): string[] {
    return this.commands.filter((c) => c.node === node).map((c) => c.command);
  }

  banner(node: string): string {
    return `${this.config.nodes[node]?.alias ?? "NODE"}:${node}} `;
  }

  connectOutcome(from: string, to: string): ConnectBehaviour {
    const outcome = this.config.links?.[`${from}>${to}`] ?? (this.config.nodes[to] ? "connected" : "failure");
    this.connects.push({ from, to, outcome });
    return outcome;
  }

  reply(node: string, command: string): string | null {
    this.commands.push({ node, command });
    const script = this.config.nodes[node]?.responses[command];
    if (script === undefined) return `${this.banner(node)}Invalid command\r\n`;
    if (script === null) return null;
    if (typeof script === "string") return this.banner(node) + script;
    const key = `${node}|${command}`;
    const n = this.replyCounts.get(key) ?? 0;
    this.replyCounts.set(key, n + 1);
    const body = script[Math.min(n, script.length - 1)];
    return body === undefined ? null : this.banner(node) + body;
  }
}

const PORT_CONNECT = /^C\s+(\d+)\s+(\S+)$/i;
const ROUTED_CONNECT = /^C\s+(\S+)$/i;

export class ScriptedLink implements TerminalLink {
  private outbox: string[] = [];
  private stack: string[];
  private login: "user" | "pass" | "ready";
  private username = "";
  private isClosed = false;

  constructor(private readonly network: ScriptedNetwork) {
    this.stack = [network.config.local];
    if (network.config.login) {
      this.login = "user";
      this.outbox.push("user:");
    } else {
      this.login = "ready";
      this.outbox.push("Welcome to the node\r\n");
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Node the session is currently talking to. */
  get current(): string {
    return this.stack[this.stack.length - 1] ?? this.network.config.local;
  }

  write(text: string): Promise<void> {
    if (this.network.stalled) return new Promise(() => {});
    if (this.isClosed) return Promise.reject(new Error("link closed"));
    for (const line of text.split(/\r\n?|\n/)) {
      if (line.trim().length > 0) this.handle(line.trim());
    }
    return Promise.resolve();
  }

  async read(timeoutMs: number): Promise<string> {
    if (this.outbox.length > 0) {
      const text = this.outbox.join("");
      this.outbox = [];
      return text;
    }
    if (!this.isClosed) this.network.advance(timeoutMs);
    return "";
  }

  async close(): Promise<void> {
    this.isClosed = true;
  }

  private handle(line: string): void {
    const login = this.network.config.login;
    if (this.login === "user") {
      this.username = line;
      this.login = "pass";
      this.outbox.push("password:");
      return;
    }
    if (this.login === "pass" && login) {
      if (this.username === login.username && line === login.password) {
        this.login = "ready";
        this.outbox.push("Welcome to the node\r\n");
      } else {
        this.outbox.push("Invalid password\r\n");
      }
      return;
    }

    const upper = line.toUpperCase();
    if (upper === "BYE") {
      this.isClosed = true;
      return;
    }
    const connect = PORT_CONNECT.exec(upper) ?? ROUTED_CONNECT.exec(upper);
    if (connect) {
      this.network.dials.push({ node: this.current, command: upper });
      const target = connect[connect.length - 1] ?? "";
      this.connect(target);
      return;
    }
    const reply = this.network.reply(this.current, upper);
    if (reply !== null) this.outbox.push(reply);
  }

  private connect(target: string): void {
    const from = this.current;
    const banner = this.network.banner(from);
    switch (this.network.connectOutcome(from, target)) {
      case "connected": {
        const alias = this.network.config.nodes[target]?.alias ?? "NODE";
        this.stack.push(target);
        this.outbox.push(`${banner}Connected to ${alias}:${target}\r\n`);
        return;
      }
      case "busy":
        this.outbox.push(`${banner}Busy from ${target}\r\n`);
        return;
      case "failure":
        this.outbox.push(`${banner}Failure with ${target}\r\n`);
        return;
      case "silent":
        return;
    }
  }
}
