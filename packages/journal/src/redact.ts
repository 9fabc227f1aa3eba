const SENSITIVE_KEYS = /^(pass|passwd|password|secret|token|credentials?|api[_-]?key)$/i;

/**
 * Replace credential-bearing fields before an event is written. Login
 * exchanges are journaled with their prompts, so a password key can show
 * up nested anywhere in a payload.
 */
export function redactPayload(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    result[k] = SENSITIVE_KEYS.test(k) && v !== undefined && v !== null ? "[REDACTED]" : redactValue(v);
  }
  return result;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactValue);
  if (isRecord(value)) return redactPayload(value);
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
