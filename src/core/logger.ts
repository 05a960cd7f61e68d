export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export type LoggerOptions = {
  minLevel?: LogLevel;
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createLogger(
  prefix: string,
  { minLevel = "info" }: LoggerOptions = {},
): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) {
      return;
    }
    const line = `${prefix} ${message}`;
    if (context) {
      console[level](line, context);
    } else {
      console[level](line);
    }
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

export const logger = createLogger("[MARKUP]", { minLevel: "warn" });
