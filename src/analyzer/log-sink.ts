import type { Logger } from "../observability/logger.js";
import type { LogSink } from "./types.js";

export const discardSink: LogSink = {
  write: () => undefined,
};

/**
 * Collects analyzer output in memory. Once closed, further writes are
 * dropped, so a backend that keeps a reference cannot leak output later.
 */
export class CapturedLog implements LogSink {
  private readonly lines: string[] = [];
  private closed = false;

  write(line: string): void {
    if (this.closed) {
      return;
    }
    for (const part of line.split(/\r?\n/)) {
      const trimmed = part.trimEnd();
      if (trimmed.length > 0) {
        this.lines.push(trimmed);
      }
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): readonly string[] {
    this.closed = true;
    return [...this.lines];
  }
}

/**
 * Runs `fn` with a fresh capture sink and closes it on every exit path.
 * Captured lines are replayed at debug level, which is off unless the
 * logger was created verbose.
 */
export async function withLogCapture<T>(
  logger: Logger,
  fn: (log: LogSink) => Promise<T>,
): Promise<T> {
  const sink = new CapturedLog();
  try {
    return await fn(sink);
  } finally {
    const lines = sink.close();
    if (logger.isLevelEnabled("debug")) {
      for (const line of lines) {
        logger.debug(line, { source: "analyzer" });
      }
    }
  }
}
