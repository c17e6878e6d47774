export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export interface LogWriter {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly json: boolean;
  readonly output?: LogWriter;
  readonly clock?: () => Date;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Leveled logger. Always writes to stderr unless another writer is given,
 * so stdout stays reserved for the report.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly output: LogWriter;
  private readonly clock: () => Date;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
    this.output = options.output ?? process.stderr;
    this.clock = options.clock ?? (() => new Date());
  }

  isLevelEnabled(level: LogLevel): boolean {
    return (
      level !== "silent" && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level]
    );
  }

  debug(msg: string, context?: LogContext): void {
    this.write("debug", msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.write("info", msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.write("warn", msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.write("error", msg, context);
  }

  child(context: LogContext): ChildLogger {
    return new ChildLogger(this, context);
  }

  private write(level: LogLevel, msg: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;
    this.output.write(this.formatMessage(level, msg, context) + "\n");
  }

  private formatMessage(
    level: LogLevel,
    msg: string,
    context?: LogContext,
  ): string {
    const entry: LogEntry = {
      ts: this.clock().toISOString(),
      level,
      msg,
      ...context,
    };

    if (this.json) {
      return JSON.stringify(entry);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr =
      context && Object.keys(context).length > 0
        ? ` ${JSON.stringify(context)}`
        : "";
    return `[${entry.ts}] ${levelStr} ${msg}${contextStr}`;
  }
}

export class ChildLogger {
  constructor(
    private readonly parent: Logger,
    private readonly context: LogContext,
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: LogContext): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: LogContext): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: LogContext): void {
    this.parent.error(msg, { ...this.context, ...context });
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

export function createSilentLogger(): Logger {
  return new Logger({ level: "silent", json: false });
}
