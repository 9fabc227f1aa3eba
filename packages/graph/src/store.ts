import { readFile, mkdir, open, rename } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { PktmapError, isGraphDocument, validateGraphDocumentData, type GraphDocument, type Logger } from "@pktmap/schemas";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads and writes one graph document. Writes go to a temporary file that
 * is fsynced and renamed over the target, so an interrupted write leaves
 * the previous document intact.
 */
export class GraphStore {
  private writeLock: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string, private readonly logger?: Logger) {}

  /** The stored document, or null if none exists yet. */
  async load(): Promise<GraphDocument | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PktmapError("invalid_document", `${this.filePath} is not valid JSON: ${reason}`);
    }
    if (!isGraphDocument(data)) {
      const { errors } = validateGraphDocumentData(data);
      throw new PktmapError("invalid_document", `${this.filePath} failed validation: ${errors.join("; ")}`);
    }
    return data;
  }

  async save(doc: GraphDocument): Promise<void> {
    const result = validateGraphDocumentData(doc);
    if (!result.valid) {
      throw new PktmapError("invalid_document", `Refusing to write invalid document: ${result.errors.join("; ")}`);
    }

    let releaseLock: () => void;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const tmpPath = this.filePath + ".tmp";
      const fh = await open(tmpPath, "w");
      try {
        await fh.writeFile(JSON.stringify(doc, null, 2) + "\n", "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      await rename(tmpPath, this.filePath);
      this.logger?.debug("graph saved", { path: this.filePath, nodes: doc.meta.total_nodes, edges: doc.meta.total_edges });
    } finally {
      releaseLock!();
    }
  }
}

/** `nodemap.json` + `N1WEC-15` → `nodemap_partial_N1WEC-15.json`, beside the output. */
export function partialPath(outputPath: string, startNode: string): string {
  const ext = extname(outputPath) || ".json";
  const stem = basename(outputPath, extname(outputPath));
  return join(dirname(outputPath), `${stem}_partial_${startNode.toUpperCase()}${ext}`);
}
