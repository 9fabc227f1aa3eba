import type { EvidenceSource, RouteEvidence } from "@pktmap/schemas";
import { isValidSsid, type MheardEntry, type NodeAlias, type RouteEntry } from "@pktmap/parsers";

/**
 * Accumulates identity observations per base callsign for one crawl. Not
 * persisted: a new store is seeded from the prior graph document at start.
 */
export class EvidenceStore {
  private byBase = new Map<string, RouteEvidence[]>();
  private seq = 0;

  /**
   * Record one observation. Out-of-range SSIDs never reach the store; the
   * parsers already reject them, this guards hand-built evidence.
   */
  add(base: string, ssid: number, source: EvidenceSource, observer: string, quality?: number): RouteEvidence | null {
    if (!isValidSsid(ssid)) return null;
    const evidence: RouteEvidence = {
      base: base.toUpperCase(),
      ssid,
      source,
      observer: observer.toUpperCase(),
      seq: ++this.seq,
    };
    if (quality !== undefined) evidence.quality = quality;
    this.push(evidence);
    return evidence;
  }

  /** Seed evidence carried over from a previous run; ranks below anything observed now. */
  seed(base: string, ssid: number, source: EvidenceSource, observer: string): void {
    if (!isValidSsid(ssid)) return;
    this.push({ base: base.toUpperCase(), ssid, source, observer: observer.toUpperCase(), seq: 0 });
  }

  recordRoutes(observer: string, entries: readonly RouteEntry[]): void {
    for (const e of entries) this.add(e.call.base, e.call.ssid, "routes", observer, e.quality);
  }

  recordNodes(observer: string, entries: readonly NodeAlias[]): void {
    for (const e of entries) this.add(e.call.base, e.call.ssid, "nodes", observer);
  }

  recordMheard(observer: string, entries: readonly MheardEntry[]): void {
    for (const e of entries) this.add(e.call.base, e.call.ssid, "mheard", observer);
  }

  get(base: string): readonly RouteEvidence[] {
    return this.byBase.get(base.toUpperCase()) ?? [];
  }

  bases(): string[] {
    return [...this.byBase.keys()].sort();
  }

  get size(): number {
    return this.byBase.size;
  }

  private push(evidence: RouteEvidence): void {
    const list = this.byBase.get(evidence.base);
    if (list) list.push(evidence);
    else this.byBase.set(evidence.base, [evidence]);
  }
}
