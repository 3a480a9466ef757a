export interface LoggerOptions {
  quiet?: boolean;
  json?: boolean;
  verbose?: boolean;
}

type Level = "debug" | "info" | "warn";

class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.options.verbose) return;
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  /**
   * Errors print even in quiet mode.
   */
  error(message: string, error?: unknown): void {
    if (this.options.json) {
      const errorData = error instanceof Error ? { error: error.message, stack: error.stack } : { error };
      console.error(JSON.stringify({ level: "error", message, ...errorData }));
      return;
    }

    console.error(message);
    if (error instanceof Error) {
      console.error(error);
    } else if (error !== undefined) {
      console.dir(error, { depth: null, colors: true });
    }
  }

  setOptions(options: LoggerOptions): void {
    this.options = { ...this.options, ...options };
  }

  private write(level: Level, message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;

    const sink = level === "warn" ? console.warn : console.log;
    if (this.options.json) {
      sink(JSON.stringify({ level, message, ...data }));
      return;
    }

    sink(message);
    if (data) {
      console.dir(data, { depth: null, colors: true });
    }
  }
}

export const logger = new Logger();
