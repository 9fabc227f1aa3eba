const CallIdPattern = "^[A-Z0-9]+(-([0-9]|1[0-5]))?$";
const TimestampPattern = "^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?Z$";

const LinkClassSchema = { type: "string", enum: ["rf", "hf", "ip"] } as const;

export const NodeRecordSchema = {
  type: "object",
  required: ["call", "node_type", "location", "ports", "aliases", "applications", "commands", "neighbors", "seen_by"],
  properties: {
    call: { type: "string", pattern: CallIdPattern },
    node_type: { type: "string", enum: ["BPQ", "FBB", "JNOS", "XRouter", "Unknown"] },
    location: {
      type: "object",
      properties: {
        grid: { type: "string" },
        lat: { type: "number", minimum: -90, maximum: 90 },
        lon: { type: "number", minimum: -180, maximum: 180 },
        city: { type: "string" },
        state: { type: "string" },
      },
      additionalProperties: false,
    },
    ports: {
      type: "array",
      items: {
        type: "object",
        required: ["number", "description", "link_class"],
        properties: {
          number: { type: "integer", minimum: 0 },
          description: { type: "string" },
          frequency_mhz: { type: "number", exclusiveMinimum: 0 },
          speed: { type: "integer", minimum: 0 },
          link_class: LinkClassSchema,
        },
        additionalProperties: false,
      },
    },
    aliases: {
      type: "object",
      additionalProperties: {
        type: "object",
        required: ["call", "confidence"],
        properties: {
          call: { type: "string", pattern: CallIdPattern },
          confidence: { type: "string", enum: ["forced", "advertised", "nodes", "mheard"] },
        },
        additionalProperties: false,
      },
    },
    applications: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "description"],
        properties: {
          name: { type: "string", minLength: 1 },
          description: { type: "string" },
          call: { type: "string" },
        },
        additionalProperties: false,
      },
    },
    commands: { type: "array", items: { type: "string" } },
    neighbors: { type: "array", items: { type: "string" } },
    note: { type: "string" },
    last_heard: { type: "string", pattern: TimestampPattern },
    last_crawled: { type: "string", pattern: TimestampPattern },
    forced_ssid: { type: "integer", minimum: 0, maximum: 15 },
    seen_by: { type: "array", items: { type: "string" } },
  },
  additionalProperties: false,
} as const;

export const EdgeRecordSchema = {
  type: "object",
  required: ["from", "to", "ports", "quality", "frequencies", "link_class", "bidirectional", "observed_by"],
  properties: {
    from: { type: "string", minLength: 1 },
    to: { type: "string", minLength: 1 },
    ports: { type: "array", items: { type: "integer", minimum: 0 } },
    quality: { type: ["integer", "null"], minimum: 0, maximum: 255 },
    frequencies: { type: "array", items: { type: "number" } },
    link_class: LinkClassSchema,
    bidirectional: { type: "boolean" },
    observed_by: { type: "array", items: { type: "string" } },
  },
  additionalProperties: false,
} as const;

export const GraphDocumentSchema = {
  type: "object",
  required: ["format_version", "generated_at", "nodes", "edges", "meta"],
  properties: {
    format_version: { const: 2 },
    generated_at: { type: "string", pattern: TimestampPattern },
    nodes: { type: "object", additionalProperties: NodeRecordSchema },
    edges: { type: "array", items: EdgeRecordSchema },
    meta: {
      type: "object",
      required: ["crawl_id", "start_node", "mode", "write_mode", "total_nodes", "total_edges", "complete", "visited", "sources"],
      properties: {
        crawl_id: { type: "string" },
        start_node: { type: ["string", "null"] },
        mode: { type: "string", enum: ["update", "reaudit", "new-only"] },
        write_mode: { type: "string", enum: ["merge", "overwrite"] },
        total_nodes: { type: "integer", minimum: 0 },
        total_edges: { type: "integer", minimum: 0 },
        complete: { type: "boolean" },
        visited: { type: "array", items: { type: "string" } },
        sources: { type: "array", items: { type: "string" } },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;
