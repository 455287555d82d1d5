export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// stdout belongs to the MCP stdio transport, so everything goes to stderr.
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    const line = `${new Date().toISOString()} ${entryLevel.toUpperCase().padEnd(5)} [${scope}] ${message}`;
    if (fields && Object.keys(fields).length > 0) {
      console.error(line, JSON.stringify(fields, replaceErrors));
      return;
    }
    console.error(line);
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  };
}

function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
