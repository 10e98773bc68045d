export interface LoggerOptions {
  quiet?: boolean;
  json?: boolean;
}

type Level = "info" | "warn" | "error";

// Looked up at call time
const sinks: Record<Level, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

class Logger {
  private options: LoggerOptions = {};

  info(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;
    this.emit("warn", message, data);
  }

  /**
   * Errors are printed even in quiet mode. Human output shows the message of
   * an `Error` cause, not its stack.
   */
  error(message: string, error?: unknown): void {
    if (this.options.json) {
      const detail = error === undefined ? {} : { error: error instanceof Error ? error.message : error };
      sinks.error(JSON.stringify({ level: "error", message, ...detail }));
      return;
    }
    sinks.error(message);
    if (error instanceof Error) {
      sinks.error(error.message);
    } else if (error !== undefined) {
      console.dir(error, { depth: null, colors: true });
    }
  }

  /**
   * Prints a command result: the raw API payload on one line in JSON mode,
   * the formatted lines otherwise.
   */
  result(payload: unknown, lines: string[]): void {
    if (this.options.quiet) return;
    if (this.options.json) {
      sinks.info(JSON.stringify(payload));
      return;
    }
    for (const line of lines) sinks.info(line);
  }

  setOptions(options: LoggerOptions): void {
    this.options = { ...this.options, ...options };
  }

  private emit(level: Exclude<Level, "error">, message: string, data?: Record<string, unknown>): void {
    if (this.options.json) {
      sinks[level](JSON.stringify({ level, message, ...data }));
      return;
    }
    sinks[level](message);
    if (data) {
      console.dir(data, { depth: null, colors: true });
    }
  }
}

export const logger = new Logger();
