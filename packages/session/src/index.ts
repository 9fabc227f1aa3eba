export { SessionManager } from "./session.js";
export type { SessionOptions, CredentialSource, OpenResult, OpenStatus, PathResult } from "./session.js";
export { TelnetLink, stripTelnetCommands } from "./link.js";
export type { TerminalLink } from "./link.js";
export {
  computeTimeouts, defaultTimeoutPolicy, TIMEOUT_LIMITS, LIVENESS_MS, POLL_MS, IDLE_MS,
} from "./timeouts.js";
export type { Timeouts, TimeoutPolicy } from "./timeouts.js";
