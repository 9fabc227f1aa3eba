export * from "./types.js";
export * from "./errors.js";
export { withTimeout, sleep, Deadline } from "./timeout.js";
export {
  validateGraphDocumentData,
  validateCrawlConfigData,
  validateJournalEventData,
  isGraphDocument,
  isCrawlConfig,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { GraphDocumentSchema, NodeRecordSchema, EdgeRecordSchema } from "./graph-document.schema.js";
export { CrawlConfigSchema } from "./crawl-config.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
