/**
 * Sink for diagnostic output. Shaped after the console so `console` itself
 * is a valid logger.
 */
export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = console;

/**
 * Logger that keeps every line in memory, for tests and for callers that
 * want to inspect a trace after the fact.
 */
export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }
}
