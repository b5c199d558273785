type LogLevel = "info" | "warn" | "error" | "debug";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

// stdout belongs to CLI output; every log line goes to stderr
function write(entry: LogEntry): void {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

function entry(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };
}

export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error === undefined ? undefined : String(error);
}

export const logger = {
  info(message: string, meta?: Record<string, unknown>): void {
    write(entry("info", message, meta));
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    write(entry("warn", message, meta));
  },

  error(
    message: string,
    error?: Error | unknown,
    meta?: Record<string, unknown>,
  ): void {
    const logged = entry("error", message, meta);
    if (error !== undefined) {
      logged.error = serializeError(error);
    }
    write(logged);
  },

  debug(message: string, meta?: Record<string, unknown>): void {
    if (process.env.LOG_LEVEL === "debug") {
      write(entry("debug", message, meta));
    }
  },
};
