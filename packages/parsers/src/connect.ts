export type ConnectClassification =
  | { status: "connected"; detail: string }
  | { status: "rejected"; detail: string }
  | { status: "pending" };

const FAILURE = /\b(BUSY|FAILURE|FAILED|NO ROUTE|NOT HEARD|NO ANSWER|TIME ?OUT|TIMED OUT|DISCONNECTED|REJECTED|UNKNOWN (?:NODE|CALL)|INVALID CALL|RETRIED OUT|LINK DOWN)\b/i;
const SUCCESS = /\bCONNECTED\b/i;

function lastLine(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n").map((l) => l.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? "";
}

/**
 * Classify the accumulated reply to a connect command. Failure markers are
 * checked first: "DISCONNECTED" and "Failure with X" both mean the far end
 * answered with a refusal.
 */
export function classifyConnectResponse(text: string): ConnectClassification {
  const failure = FAILURE.exec(text);
  if (failure) return { status: "rejected", detail: lastLine(text) || failure[0] };
  if (SUCCESS.test(text)) return { status: "connected", detail: lastLine(text) };
  return { status: "pending" };
}

/** True when the buffer ends in a node command prompt (`>` or a `}` banner). */
export function isPrompt(buffer: string): boolean {
  return /[>}]\s*$/.test(buffer);
}

export function isUsernamePrompt(buffer: string): boolean {
  return /(?:user(?:name)?|callsign)\s*:\s*$/i.test(buffer);
}

export function isPasswordPrompt(buffer: string): boolean {
  return /password\s*:\s*$/i.test(buffer);
}

export function isLoginFailure(buffer: string): boolean {
  return /(?:invalid|incorrect|bad)\s+(?:password|user|login)|login\s+(?:failed|incorrect)|access denied/i.test(buffer);
}
