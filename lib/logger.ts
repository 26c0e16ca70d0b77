// lib/logger.ts

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isKnownLevel(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveThreshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return isKnownLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

/**
 * Thin console logger. Messages carry a bracketed tag, e.g. "[rank] ...".
 * LOG_LEVEL is read on every call so tests and scripts can change it at runtime.
 */
class Logger {
  private log(level: LogLevel, message: string, context?: LogContext) {
    if (LEVEL_ORDER[level] < resolveThreshold()) return;

    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}`;
    const args: unknown[] = context ? [line, context] : [line];

    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  }

  debug(message: string, context?: LogContext) {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext) {
    const errorContext: LogContext = { ...context };

    if (error instanceof Error) {
      errorContext.errorName = error.name;
      errorContext.errorMessage = error.message;
      errorContext.errorStack = error.stack;
    } else if (error !== undefined) {
      errorContext.error = error;
    }

    this.log("error", message, errorContext);
  }
}

export const logger = new Logger();
