import { hostname } from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "cookie",
  "email",
  "apikey",
  "api_key",
  "ipaddress",
];

const REDACTED = "***";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

function serializeError(error: Error): LogContext {
  return {
    name: error.name,
    message: error.message,
    ...(process.env.NODE_ENV !== "production" && error.stack ? { stack: error.stack } : {}),
  };
}

function redact(value: unknown, depth = 0): unknown {
  if (value instanceof Error) return serializeError(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => redact(item, depth + 1));
  if (value === null || typeof value !== "object" || depth > 5) return value;

  const result: LogContext = {};
  for (const [key, nested] of Object.entries(value)) {
    if (nested === undefined) continue;
    result[key] = isSensitiveKey(key) ? REDACTED : redact(nested, depth + 1);
  }
  return result;
}

function redactContext(context: LogContext): LogContext {
  const redacted = redact(context);
  return redacted !== null && typeof redacted === "object" && !Array.isArray(redacted)
    ? { ...redacted }
    : {};
}

const CONSOLE_METHOD: Record<LogLevel, (message: string) => void> = {
  debug: (message) => console.debug(message),
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
  fatal: (message) => console.error(message),
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  fatal(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly bindings: LogContext,
    private readonly minLevel: LogLevel,
    private readonly json: boolean
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.write("fatal", message, context);
  }

  child(bindings: LogContext): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings }, this.minLevel, this.json);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) return;

    const timestamp = new Date().toISOString();
    const payload = redactContext({ ...this.bindings, ...context });

    if (this.json) {
      CONSOLE_METHOD[level](
        JSON.stringify({
          timestamp,
          level: LEVEL_PRIORITY[level],
          levelName: level,
          message,
          hostname: hostname(),
          pid: process.pid,
          ...payload,
        })
      );
      return;
    }

    const serialized = Object.keys(payload).length > 0 ? ` ${JSON.stringify(payload)}` : "";
    CONSOLE_METHOD[level](`[${timestamp}] [${level.toUpperCase()}] ${message}${serialized}`);
  }
}

const isProduction = process.env.NODE_ENV === "production";
const configuredLevel = process.env.LOG_LEVEL;

const logger: Logger = new ConsoleLogger(
  { service: "commerce-engine", env: process.env.NODE_ENV ?? "development" },
  isLogLevel(configuredLevel) ? configuredLevel : isProduction ? "info" : "debug",
  isProduction
);

export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export default logger;
