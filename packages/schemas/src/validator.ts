import { Ajv, type ErrorObject } from "ajv";
import { GraphDocumentSchema } from "./graph-document.schema.js";
import { CrawlConfigSchema } from "./crawl-config.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import type { CrawlConfig, GraphDocument, JournalEvent } from "./types.js";

const ajv = new Ajv({ allErrors: true, strict: false });

const validateGraphDocument = ajv.compile<GraphDocument>(GraphDocumentSchema);
const validateCrawlConfig = ajv.compile<CrawlConfig>(CrawlConfigSchema);
const validateJournalEvent = ajv.compile<JournalEvent>(JournalEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateGraphDocumentData(data: unknown): ValidationResult {
  const valid = validateGraphDocument(data);
  return toResult(valid, validateGraphDocument.errors);
}

export function validateCrawlConfigData(data: unknown): ValidationResult {
  const valid = validateCrawlConfig(data);
  return toResult(valid, validateCrawlConfig.errors);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

/** Type guard form used where a parsed value must become a GraphDocument. */
export function isGraphDocument(data: unknown): data is GraphDocument {
  return validateGraphDocument(data);
}

export function isCrawlConfig(data: unknown): data is CrawlConfig {
  return validateCrawlConfig(data);
}
