/**
 * Error taxonomy for the crawler. Inside the crawl loop these conditions
 * travel as outcome values; the classes exist for the API boundaries that
 * throw (configuration, persistence, strict merges) and so that a thrown
 * condition carries the same reason code the run summary uses.
 */

export type PktmapErrorCode =
  | "connection_timeout"
  | "authentication_failure"
  | "protocol_parse"
  | "unroutable_target"
  | "stale_node"
  | "self_merge"
  | "invalid_config"
  | "invalid_document"
  | "invalid_path"
  | "link_lost"
  | "timeout";

export class PktmapError extends Error {
  readonly code: PktmapErrorCode;

  constructor(code: PktmapErrorCode, message: string) {
    super(message);
    this.name = "PktmapError";
    this.code = code;
  }
}

export class TimeoutError extends PktmapError {
  constructor(message: string) {
    super("timeout", message);
    this.name = "TimeoutError";
  }
}

export class ConnectionTimeoutError extends PktmapError {
  constructor(readonly target: string, readonly timeoutMs: number) {
    super("connection_timeout", `Connection to ${target} timed out after ${timeoutMs}ms`);
    this.name = "ConnectionTimeoutError";
  }
}

export class AuthenticationFailureError extends PktmapError {
  constructor(message: string) {
    super("authentication_failure", message);
    this.name = "AuthenticationFailureError";
  }
}

export class ProtocolParseError extends PktmapError {
  constructor(readonly command: string, readonly attempts: number) {
    super("protocol_parse", `No valid ${command} response after ${attempts} attempt(s)`);
    this.name = "ProtocolParseError";
  }
}

export class UnroutableTargetError extends PktmapError {
  constructor(readonly target: string, detail: string) {
    super("unroutable_target", `${target} is unroutable: ${detail}`);
    this.name = "UnroutableTargetError";
  }
}

export class StaleNodeError extends PktmapError {
  constructor(readonly target: string, readonly ageMs: number) {
    super("stale_node", `${target} last heard ${Math.round(ageMs / 3_600_000)}h ago`);
    this.name = "StaleNodeError";
  }
}

export class SelfMergeAttemptError extends PktmapError {
  constructor(readonly path: string) {
    super("self_merge", `Refusing to merge output document into itself: ${path}`);
    this.name = "SelfMergeAttemptError";
  }
}
