import {
  AuthenticationFailureError, ConnectionTimeoutError, Deadline, PktmapError, withTimeout,
  type CommandOutcome, type Credentials, type HopReport, type HopSpec, type HopStatus, type Logger,
} from "@pktmap/schemas";
import {
  classifyConnectResponse, isLoginFailure, isPasswordPrompt, isPrompt, isUsernamePrompt,
} from "@pktmap/parsers";
import type { TerminalLink } from "./link.js";
import { defaultTimeoutPolicy, IDLE_MS, LIVENESS_MS, POLL_MS, type TimeoutPolicy } from "./timeouts.js";

/** Credentials, or a prompt that supplies them the first time the node asks. */
export type CredentialSource = Credentials | (() => Promise<Credentials>);

export interface SessionOptions {
  link: TerminalLink;
  logger?: Logger;
  credentials?: CredentialSource;
  /** Resends of a command whose response fails validation. Default 2. */
  commandRetries?: number;
  policy?: TimeoutPolicy;
  pollMs?: number;
  idleMs?: number;
  livenessMs?: number;
  now?: () => number;
  onRetry?: (command: string, attempt: number, response: string) => void;
}

export type OpenStatus = "connected" | "timed_out" | "auth_failed" | "link_lost";

export interface OpenResult {
  status: OpenStatus;
  detail: string;
}

export interface PathResult {
  status: "connected" | "failed" | "aborted";
  hops: HopReport[];
}

type ReadEnd = "match" | "idle" | "timeout" | "closed";

interface ReadResult {
  text: string;
  end: ReadEnd;
}

const noopLogger: Logger = { debug() {}, info() {}, warn() {}, error() {} };

function lastLine(text: string): string {
  const lines = text.split(/\r\n?|\n/).map((l) => l.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? "";
}

/** A prompt only counts once at least one full line of output came before it. */
function endsWithPrompt(text: string): boolean {
  return /[\r\n]/.test(text) && isPrompt(text);
}

function hopCommand(hop: HopSpec): string {
  return hop.kind === "port" ? `C ${hop.port} ${hop.call}` : `C ${hop.call}`;
}

/**
 * Drives one terminal session: login at the local node, hop-by-hop connects
 * along a path, then command/response exchanges at the far end. Every
 * result comes back as a value; nothing here decides whether a node is
 * reachable.
 */
export class SessionManager {
  private readonly link: TerminalLink;
  private readonly logger: Logger;
  private readonly policy: TimeoutPolicy;
  private readonly commandRetries: number;
  private readonly pollMs: number;
  private readonly idleMs: number;
  private readonly livenessMs: number;
  private readonly now: () => number;
  private readonly onRetry?: (command: string, attempt: number, response: string) => void;
  private readonly credentialSource?: CredentialSource;
  private credentials: Credentials | null = null;
  private depth = 0;
  private operation: Deadline | null = null;

  constructor(opts: SessionOptions) {
    this.link = opts.link;
    this.logger = opts.logger ?? noopLogger;
    this.policy = opts.policy ?? defaultTimeoutPolicy;
    this.commandRetries = opts.commandRetries ?? 2;
    this.pollMs = opts.pollMs ?? POLL_MS;
    this.idleMs = opts.idleMs ?? IDLE_MS;
    this.livenessMs = opts.livenessMs ?? LIVENESS_MS;
    this.now = opts.now ?? Date.now;
    this.onRetry = opts.onRetry;
    this.credentialSource = opts.credentials;
  }

  /** Hops connected so far. */
  get hops(): number {
    return this.depth;
  }

  /** Log in to the local node, answering username and password prompts. */
  async open(): Promise<OpenResult> {
    const budget = this.policy.compute(0).connectMs;
    let sentUser = false;
    let sentPass = false;
    for (;;) {
      const { text, end } = await this.readUntil(
        (t) => isLoginFailure(t) || isUsernamePrompt(t) || isPasswordPrompt(t) || endsWithPrompt(t),
        budget,
      );
      if (end === "closed") return { status: "link_lost", detail: "link closed during login" };
      if (isLoginFailure(text) || (sentUser && isUsernamePrompt(text)) || (sentPass && isPasswordPrompt(text))) {
        return this.authFailed(lastLine(text) || "login rejected");
      }
      if (isUsernamePrompt(text)) {
        const { username } = await this.resolveCredentials();
        if (!username) return this.authFailed("node asked for a username and none is configured");
        if (!(await this.send(username))) return { status: "link_lost", detail: "link lost during login" };
        sentUser = true;
        continue;
      }
      if (isPasswordPrompt(text)) {
        const { password } = await this.resolveCredentials();
        if (password === undefined) return this.authFailed("node asked for a password and none is configured");
        if (!(await this.send(password))) return { status: "link_lost", detail: "link lost during login" };
        sentPass = true;
        continue;
      }
      if (end === "timeout") return { status: "timed_out", detail: `no response from local node in ${budget}ms` };
      this.logger.debug("logged in", { banner: lastLine(text) });
      return { status: "connected", detail: lastLine(text) };
    }
  }

  /**
   * Connect along `path` one hop at a time, stopping at the first hop that
   * does not connect. Cancellation is observed between hops.
   */
  async executePath(path: readonly HopSpec[], signal?: AbortSignal): Promise<PathResult> {
    path.forEach((hop, i) => {
      if (hop.kind === "port" && i > 0) {
        throw new PktmapError("invalid_path", `Hop ${i + 1} (${hop.call}) cannot use a port connect`);
      }
    });
    this.operation = new Deadline(this.policy.compute(path.length).operationMs, this.now);
    const hops: HopReport[] = [];
    for (let i = 0; i < path.length; i++) {
      const hop = path[i]!;
      if (signal?.aborted) return { status: "aborted", hops };
      // budget by the hops the connect's reply must cross back: the links already up plus the new one
      const report = await this.connectHop(hop, i + 1);
      hops.push(report);
      if (report.status !== "connected") return { status: "failed", hops };
      this.depth++;
    }
    return { status: "connected", hops };
  }

  /**
   * Send one command at the far end and collect its response. A response
   * that fails `validate` is treated as RF garbling and the command resent,
   * up to the retry budget.
   */
  async runCommand(command: string, validate: (text: string) => boolean = () => true): Promise<CommandOutcome> {
    const budget = this.policy.compute(this.depth).commandMs;
    const maxAttempts = this.commandRetries + 1;
    let text = "";
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (this.operation?.expired()) return { status: "timed_out", command, text, attempts: attempt };
      await this.drain();
      if (!(await this.send(command))) return { status: "link_lost", command, text, attempts: attempt };
      const read = await this.readUntil(endsWithPrompt, budget, true);
      text = read.text;
      this.logger.debug(command, { response: text });
      if (read.end === "closed") return { status: "link_lost", command, text, attempts: attempt };
      if (read.end === "timeout" && text.length === 0) return { status: "timed_out", command, text, attempts: attempt };
      if (validate(text)) return { status: "ok", command, text, attempts: attempt };
      if (attempt < maxAttempts) {
        this.logger.debug("response failed validation, resending", { command, attempt });
        this.onRetry?.(command, attempt, text);
      }
    }
    return { status: "parse_error", command, text, attempts: maxAttempts };
  }

  /** Send BYE and drop the link. */
  async close(): Promise<void> {
    if (!this.link.closed) await this.send("BYE");
    await this.link.close();
    this.depth = 0;
    this.operation = null;
  }

  private async connectHop(hop: HopSpec, distance: number): Promise<HopReport> {
    const started = this.now();
    const budget = this.policy.compute(distance).connectMs;
    const report = (status: HopStatus, detail: string): HopReport => ({
      hop, status, detail, elapsed_ms: this.now() - started,
    });

    await this.drain();
    if (!(await this.send(hopCommand(hop)))) return report("rejected", "link lost before connect");
    const { text, end } = await this.readUntil((t) => classifyConnectResponse(t).status !== "pending", budget, false);
    const verdict = classifyConnectResponse(text);
    if (verdict.status === "connected") {
      // the far node may follow with its own greeting
      await this.readUntil(endsWithPrompt, this.idleMs, true);
      this.logger.debug("hop connected", { call: hop.call, elapsed_ms: this.now() - started });
      return report("connected", verdict.detail);
    }
    if (verdict.status === "rejected") return report("rejected", verdict.detail);
    if (end === "closed") return report("rejected", "link closed");
    return report("timed_out", new ConnectionTimeoutError(hop.call, budget).message);
  }

  /**
   * Read until `done` matches, the link goes quiet after data (when `idle`
   * is set), or the budget runs out. Each read is one poll slice, and the
   * budget never outlasts the per-node operation ceiling.
   */
  private async readUntil(done: (text: string) => boolean, budgetMs: number, idle = true): Promise<ReadResult> {
    const ceiling = this.operation ? Math.min(budgetMs, this.operation.remaining()) : budgetMs;
    const deadline = new Deadline(ceiling, this.now);
    let text = "";
    let lastData = this.now();
    for (;;) {
      const remaining = deadline.remaining();
      if (remaining === 0) return { text, end: "timeout" };
      const chunk = await this.link.read(Math.min(this.pollMs, remaining));
      if (chunk.length > 0) {
        text += chunk;
        lastData = this.now();
        if (done(text)) return { text, end: "match" };
        continue;
      }
      if (this.link.closed) return { text, end: "closed" };
      if (idle && text.length > 0 && this.now() - lastData >= this.idleMs) return { text, end: "idle" };
    }
  }

  /** Discard output left over from an earlier exchange. */
  private async drain(): Promise<void> {
    const stale = await this.link.read(0);
    if (stale.length > 0) this.logger.debug("discarded unsolicited output", { text: stale });
  }

  /** Write one line, giving up if the link will not take it within the liveness window. */
  private async send(line: string): Promise<boolean> {
    if (this.link.closed) return false;
    try {
      await withTimeout(this.link.write(`${line}\r`), this.livenessMs, "Link write");
      return true;
    } catch (err) {
      this.logger.warn("link not accepting writes", { error: err instanceof Error ? err.message : String(err) });
      return false;
    }
  }

  private async resolveCredentials(): Promise<Credentials> {
    if (!this.credentials) {
      const source = this.credentialSource;
      this.credentials = typeof source === "function" ? await source() : source ?? {};
    }
    return this.credentials;
  }

  private authFailed(detail: string): OpenResult {
    const err = new AuthenticationFailureError(detail);
    this.logger.warn(err.message);
    return { status: "auth_failed", detail: err.message };
  }
}
