export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const EMOJI: Record<LogLevel, string> = {
  debug: "🔍",
  info: "✅",
  warn: "⚠️ ",
  error: "❌",
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  context?: Record<string, unknown>;
}

const isThresholdName = (value: string): value is LogLevel | "silent" =>
  Object.hasOwn(LEVEL_ORDER, value);

// Read on every call: the logger is used before configuration is loaded.
const threshold = (): number => {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return configured && isThresholdName(configured)
    ? LEVEL_ORDER[configured]
    : LEVEL_ORDER.info;
};

const describeError = (error: unknown): LogEntry["error"] => {
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    return { name: error.name, message: error.message, code, stack: error.stack };
  }
  return { name: "NonError", message: String(error) };
};

export class Logger {
  static debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", message, undefined, context);
  }

  static info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, undefined, context);
  }

  static warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, undefined, context);
  }

  static error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ): void {
    this.write("error", message, error, context);
  }

  private static write(
    level: LogLevel,
    message: string,
    error: unknown,
    context?: Record<string, unknown>
  ): void {
    if (LEVEL_ORDER[level] < threshold()) return;

    const sink =
      level === "error" ? console.error : level === "warn" ? console.warn : console.log;

    if (process.env.NODE_ENV === "production") {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(error !== undefined && { error: describeError(error) }),
        ...(context && { context }),
      };
      sink(JSON.stringify(entry));
      return;
    }

    sink(`${EMOJI[level]} ${message}`);
    if (error !== undefined) sink(error);
    if (context) sink("Context:", context);
  }
}
