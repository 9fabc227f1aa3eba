import { createHash } from "node:crypto";
import { appendFile, mkdir, open, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType, Logger } from "@pktmap/schemas";
import { validateJournalEventData } from "@pktmap/schemas";
import { redactPayload } from "./redact.js";

export interface JournalOptions {
  /** fsync every append. Tests turn this off. */
  fsync?: boolean;
  /** Mask credentials in payloads before they reach disk. */
  redact?: boolean;
  logger?: Logger;
}

interface ChainScan {
  /** Number of leading lines whose hash chain holds. */
  intact: number;
  lastHash: string | undefined;
  maxSeq: number;
}

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function parseEvent(line: string): JournalEvent | null {
  try {
    return JSON.parse(line) as JournalEvent;
  } catch {
    return null;
  }
}

function scanChain(lines: readonly string[]): ChainScan {
  let lastHash: string | undefined;
  let maxSeq = -1;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!;
    const event = parseEvent(line);
    if (!event || (i > 0 && event.hash_prev !== lastHash)) return { intact: i, lastHash, maxSeq };
    lastHash = sha256(line);
    if (event.seq !== undefined) maxSeq = Math.max(maxSeq, event.seq);
  }
  return { intact: lines.length, lastHash, maxSeq };
}

/**
 * Append-only JSONL log of crawl events. Each line records the sha256 of
 * the line before it; `init` cuts the file back to its last intact line.
 */
export class Journal {
  private readonly fsync: boolean;
  private readonly redact: boolean;
  private readonly logger: Logger | undefined;
  private queue: Promise<unknown> = Promise.resolve();
  private lastHash: string | undefined;
  private nextSeq = 0;

  constructor(private readonly filePath: string, options: JournalOptions = {}) {
    this.fsync = options.fsync ?? true;
    this.redact = options.redact ?? true;
    this.logger = options.logger;
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const lines = await this.readLines();
    const scan = scanChain(lines);
    if (scan.intact < lines.length) {
      const kept = lines.slice(0, scan.intact);
      const tmpPath = `${this.filePath}.tmp`;
      await writeFile(tmpPath, kept.map((l) => l + "\n").join(""), "utf-8");
      await rename(tmpPath, this.filePath);
      this.logger?.warn("journal truncated to last intact line", {
        path: this.filePath,
        kept: scan.intact,
        dropped: lines.length - scan.intact,
      });
    }
    this.lastHash = scan.lastHash;
    this.nextSeq = scan.maxSeq + 1;
  }

  emit(crawlId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent> {
    const write = this.queue.then(() => this.append(crawlId, type, payload));
    this.queue = write.catch(() => undefined);
    return write;
  }

  /** Like `emit`, but a failed write is logged and reported as null. */
  async tryEmit(crawlId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent | null> {
    try {
      return await this.emit(crawlId, type, payload);
    } catch (err) {
      this.logger?.warn("journal write failed", { type, error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }

  async readAll(options: { limit?: number } = {}): Promise<JournalEvent[]> {
    const events: JournalEvent[] = [];
    for (const line of await this.readLines()) {
      const event = parseEvent(line);
      if (event) events.push(event);
    }
    const { limit } = options;
    return limit !== undefined && limit < events.length ? events.slice(events.length - limit) : events;
  }

  async readCrawl(crawlId: string): Promise<JournalEvent[]> {
    return (await this.readAll()).filter((e) => e.crawl_id === crawlId);
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const lines = await this.readLines();
    const { intact } = scanChain(lines);
    return intact === lines.length ? { valid: true } : { valid: false, brokenAt: intact };
  }

  /** Resolves once every queued write has settled. */
  async close(): Promise<void> {
    await this.queue;
  }

  private async append(crawlId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent> {
    const event: JournalEvent = {
      event_id: uuid(),
      timestamp: new Date().toISOString(),
      crawl_id: crawlId,
      type,
      payload: this.redact ? redactPayload(payload) : payload,
      hash_prev: this.lastHash,
      seq: this.nextSeq,
    };
    const check = validateJournalEventData(event);
    if (!check.valid) throw new Error(`Invalid journal event: ${check.errors.join(", ")}`);

    const line = JSON.stringify(event);
    await this.writeLine(line + "\n");
    this.lastHash = sha256(line);
    this.nextSeq++;

    return event;
  }

  private async writeLine(text: string): Promise<void> {
    if (!this.fsync) {
      await appendFile(this.filePath, text, "utf-8");
      return;
    }
    const fh = await open(this.filePath, "a");
    try {
      await fh.write(text, undefined, "utf-8");
      await fh.sync();
    } finally {
      await fh.close();
    }
  }

  private async readLines(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return content.split("\n").filter((l) => l.trim().length > 0);
  }
}
