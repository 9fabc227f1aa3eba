import type { LogLevel, Logger } from "@pktmap/schemas";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export class ConsoleLogger implements Logger {
  private prefix: string;
  private threshold: number;

  constructor(component: string, private level: LogLevel = "info") {
    // Component tags end up on a terminal; strip control chars
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safe = component.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[${safe}]`;
    this.threshold = LEVEL_ORDER[level];
  }

  /** A logger for a sub-component sharing this logger's level. */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix.slice(1, -1)}:${component}`, this.level);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

/** Logger that drops everything; used where a component is run headless. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
