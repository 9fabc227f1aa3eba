import type { CommandOutcome, RunSummary, SkipEntry, SkipReason } from "@pktmap/schemas";

/** Accumulates the per-run report as the crawl progresses. */
export class SummaryBuilder {
  private skipped: SkipEntry[] = [];
  private skippedKeys = new Set<string>();
  private visited: string[] = [];
  private attempts = 0;
  private commands = { ok: 0, retried: 0, failed: 0 };

  constructor(private readonly crawlId: string, private readonly startedAt: string) {}

  /** Record a skipped node once per reason. */
  skip(node: string, reason: SkipReason, detail: string): boolean {
    const key = `${node}|${reason}`;
    if (this.skippedKeys.has(key)) return false;
    this.skippedKeys.add(key);
    this.skipped.push({ node, reason, detail });
    return true;
  }

  visit(id: string): void {
    if (!this.visited.includes(id)) this.visited.push(id);
  }

  attempt(): void {
    this.attempts++;
  }

  countCommands(outcomes: readonly CommandOutcome[]): void {
    for (const o of outcomes) {
      if (o.status === "ok") this.commands.ok++;
      else this.commands.failed++;
      this.commands.retried += o.attempts - 1;
    }
  }

  build(finishedAt: string, interrupted: boolean): RunSummary {
    return {
      crawl_id: this.crawlId,
      started_at: this.startedAt,
      finished_at: finishedAt,
      interrupted,
      visited: [...this.visited],
      skipped: [...this.skipped],
      attempts: this.attempts,
      commands: { ...this.commands },
    };
  }
}

/** Human-readable run report, one line per skipped node. */
export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    `Crawl ${summary.crawl_id}${summary.interrupted ? " (interrupted)" : ""}`,
    `Visited ${summary.visited.length} node(s) in ${summary.attempts} attempt(s)`,
    `Commands: ${summary.commands.ok} ok, ${summary.commands.retried} retried, ${summary.commands.failed} failed`,
  ];
  if (summary.skipped.length > 0) {
    lines.push(`Skipped ${summary.skipped.length}:`);
    for (const s of summary.skipped) lines.push(`  ${s.node}  ${s.reason}  ${s.detail}`);
  }
  return lines.join("\n");
}
