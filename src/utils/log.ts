export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogRecord {
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

type Sink = (record: LogRecord) => void;

class ScopedLogger implements Logger {
  constructor(
    private readonly sink: Sink,
    private readonly scope: string
  ) {}

  debug(message: string): void {
    this.sink({ level: "debug", scope: this.scope, message });
  }

  info(message: string): void {
    this.sink({ level: "info", scope: this.scope, message });
  }

  warn(message: string): void {
    this.sink({ level: "warn", scope: this.scope, message });
  }

  error(message: string): void {
    this.sink({ level: "error", scope: this.scope, message });
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }
}

export function formatRecord(record: LogRecord): string {
  const prefix = record.scope ? `[${record.scope}] ` : "";
  return `${record.level.toUpperCase().padEnd(5)} ${prefix}${record.message}`;
}

/** Console-backed logger; warn and error go to stderr. */
export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const threshold = LEVEL_ORDER[options.verbose ? "debug" : "info"];
  return new ScopedLogger((record) => {
    if (LEVEL_ORDER[record.level] < threshold) {
      return;
    }
    const line = formatRecord(record);
    if (record.level === "warn" || record.level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }, "");
}

export function createSilentLogger(): Logger {
  return new ScopedLogger(() => undefined, "");
}

/** Keeps every record in memory; used by tests to assert on warnings. */
export function createRecordingLogger(): Logger & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = new ScopedLogger((record) => records.push(record), "");
  return Object.assign(logger, { records });
}
