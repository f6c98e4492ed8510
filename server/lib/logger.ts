export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

function parseLevel(raw: string | undefined): LogLevel | null {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return null;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger tagged with a dotted scope, e.g. `ris.search`.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
    switch (level) {
      case "debug":
        console.debug(line, ...details);
        break;
      case "info":
        console.log(line, ...details);
        break;
      case "warn":
        console.warn(line, ...details);
        break;
      case "error":
        console.error(line, ...details);
        break;
    }
  };

  return {
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}
