export const CrawlConfigSchema = {
  type: "object",
  required: [
    "local_node", "start_node", "host", "port", "max_hops", "mode", "exclude",
    "force_ssid", "merge_inputs", "output_path", "csv_path", "write_mode",
    "credentials", "log_level", "stale_after_ms", "tie_break", "command_retries",
    "max_attempts", "node_delay_ms", "journal_path",
  ],
  properties: {
    local_node: { type: "string", pattern: "^[A-Z0-9]+(-([0-9]|1[0-5]))?$" },
    start_node: { type: "string", pattern: "^[A-Z0-9]+(-([0-9]|1[0-5]))?$" },
    host: { type: "string", minLength: 1 },
    port: { type: "integer", minimum: 1, maximum: 65535 },
    max_hops: { type: "integer", minimum: 0, maximum: 50 },
    mode: { type: "string", enum: ["update", "reaudit", "new-only"] },
    exclude: { type: "array", items: { type: "string", minLength: 1 } },
    force_ssid: {
      type: "object",
      additionalProperties: { type: "integer", minimum: 0, maximum: 15 },
    },
    merge_inputs: { type: "array", items: { type: "string", minLength: 1 } },
    output_path: { type: "string", minLength: 1 },
    csv_path: { type: ["string", "null"] },
    write_mode: { type: "string", enum: ["merge", "overwrite"] },
    credentials: {
      type: "object",
      properties: {
        username: { type: "string" },
        password: { type: "string" },
      },
      additionalProperties: false,
    },
    log_level: { type: "string", enum: ["debug", "info", "warn", "error"] },
    stale_after_ms: { type: "integer", minimum: 0 },
    tie_break: { type: "string", enum: ["most_recent", "lowest_ssid", "highest_ssid"] },
    command_retries: { type: "integer", minimum: 0, maximum: 10 },
    max_attempts: { type: "integer", minimum: 1, maximum: 20 },
    node_delay_ms: { type: "integer", minimum: 0 },
    journal_path: { type: ["string", "null"] },
  },
  additionalProperties: false,
} as const;
