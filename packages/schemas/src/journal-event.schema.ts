export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "crawl_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", minLength: 1 },
    crawl_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "crawl.started", "crawl.completed", "crawl.interrupted",
        "node.attempting", "node.visited", "node.excluded", "node.failed",
        "hop.connected", "hop.failed", "command.retried",
        "graph.saved", "merge.rejected",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
