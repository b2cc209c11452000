export type LogLevel = "info" | "warn" | "error";

export type LogEntry = {
  at: string;
  level: LogLevel;
  message: string;
};

export type Logger = {
  scope: string;
  entries: LogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  child: (scope: string) => Logger;
};

function isSilent() {
  return process.env.VENDOR_MATCH_LOG_SILENT === "1";
}

/**
 * Scoped logger. Entries are kept in memory (shared with child loggers) and
 * echoed to the console as `[scope:level] message`.
 */
export function createLogger(scope: string, entries: LogEntry[] = []): Logger {
  const push = (level: LogLevel, message: string) => {
    const entry: LogEntry = {
      at: new Date().toISOString(),
      level,
      message: `[${scope}] ${message}`,
    };
    entries.push(entry);

    if (isSilent()) return;
    if (level === "error") {
      console.error(`[${scope}:${level}] ${message}`);
      return;
    }
    if (level === "warn") {
      console.warn(`[${scope}:${level}] ${message}`);
      return;
    }
    console.log(`[${scope}:${level}] ${message}`);
  };

  return {
    scope,
    entries,
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, entries),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
