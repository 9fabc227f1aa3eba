export { Journal } from "./journal.js";
export type { JournalOptions } from "./journal.js";
export { redactPayload } from "./redact.js";
export { ConsoleLogger, silentLogger } from "./logger.js";
