import { connect, type Socket } from "node:net";
import { PktmapError, withTimeout, type Logger } from "@pktmap/schemas";

/**
 * A byte-oriented terminal connection to the local node. The session
 * manager only ever holds one.
 */
export interface TerminalLink {
  /** Resolves once the text has been handed to the transport. */
  write(text: string): Promise<void>;
  /**
   * Resolve with whatever text arrives within `timeoutMs`, or "" on silence.
   * Buffered text is returned at once.
   */
  read(timeoutMs: number): Promise<string>;
  readonly closed: boolean;
  close(): Promise<void>;
}

const IAC = 255;
const SB = 250;
const SE = 240;
const WILL = 251;
const DONT = 254;

/** Drop telnet option negotiation from a received chunk. */
export function stripTelnetCommands(buf: Uint8Array): string {
  const out: number[] = [];
  for (let i = 0; i < buf.length; i++) {
    const b = buf[i]!;
    if (b !== IAC) {
      out.push(b);
      continue;
    }
    const cmd = buf[i + 1];
    if (cmd === IAC) {
      out.push(IAC);
      i++;
    } else if (cmd === SB) {
      let j = i + 2;
      while (j < buf.length && !(buf[j] === IAC && buf[j + 1] === SE)) j++;
      i = j + 1;
    } else if (cmd !== undefined && cmd >= WILL && cmd <= DONT) {
      i += 2;
    } else {
      i++;
    }
  }
  return Buffer.from(out).toString("latin1");
}

/** Telnet connection to a BPQ-style node's telnet server. */
export class TelnetLink implements TerminalLink {
  private chunks: string[] = [];
  private waiter: (() => void) | null = null;
  private isClosed = false;

  private constructor(private readonly socket: Socket, logger?: Logger) {
    socket.on("data", (data: Buffer) => {
      const text = stripTelnetCommands(data);
      if (text.length > 0) {
        this.chunks.push(text);
        this.wake();
      }
    });
    socket.on("close", () => {
      this.isClosed = true;
      this.wake();
    });
    // "close" always follows an error
    socket.on("error", (err) => {
      logger?.warn("telnet link error", { error: err.message });
    });
  }

  static async open(host: string, port: number, timeoutMs: number, logger?: Logger): Promise<TelnetLink> {
    const socket = connect({ host, port });
    try {
      await withTimeout(
        new Promise<void>((resolve, reject) => {
          socket.once("connect", resolve);
          socket.once("error", reject);
        }),
        timeoutMs,
        `Connect to ${host}:${port}`,
      );
    } catch (err) {
      socket.destroy();
      throw err;
    }
    socket.setNoDelay(true);
    return new TelnetLink(socket, logger);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  write(text: string): Promise<void> {
    if (this.isClosed) return Promise.reject(new PktmapError("link_lost", "Link is closed"));
    return new Promise((resolve, reject) => {
      this.socket.write(Buffer.from(text, "latin1"), (err) => (err ? reject(err) : resolve()));
    });
  }

  async read(timeoutMs: number): Promise<string> {
    if (this.chunks.length === 0 && !this.isClosed && timeoutMs > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.waiter = null;
          resolve();
        }, timeoutMs);
        this.waiter = () => {
          clearTimeout(timer);
          resolve();
        };
      });
    }
    const text = this.chunks.join("");
    this.chunks = [];
    return text;
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.socket.end();
    this.socket.destroy();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
