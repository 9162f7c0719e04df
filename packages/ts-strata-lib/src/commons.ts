import * as util from "util";

/**
 * Returns true if the value is a common truthy string: "1", "true", "yes", "on" (case-insensitive).
 */
export function isTruthy(value: string | undefined): boolean {
  if (!value) return false;
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    default:
      return false;
  }
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogSettings {
  level: "debug" | "info";
  structured: boolean;
  disabled: boolean;
}

let logSettings: LogSettings | undefined;

/**
 * Overrides the logging settings otherwise read from the environment.
 * Passing `undefined` restores the environment-driven behaviour.
 */
export function configureLogging(settings: LogSettings | undefined): void {
  logSettings = settings;
}

/**
 * Current logging settings. Environment variables win over configured values:
 * STRATA_DISABLE_LOGS, STRATA_STRUCTURED_LOGS and STRATA_LOG_LEVEL.
 */
export function getLogSettings(): LogSettings {
  const base: LogSettings = logSettings ?? {
    level: "info",
    structured: false,
    disabled: false,
  };
  const envLevel = process.env.STRATA_LOG_LEVEL?.trim().toLowerCase();
  return {
    level:
      envLevel === "debug" ? "debug"
      : envLevel === "info" ? "info"
      : base.level,
    structured: base.structured || isTruthy(process.env.STRATA_STRUCTURED_LOGS),
    disabled: base.disabled || isTruthy(process.env.STRATA_DISABLE_LOGS),
  };
}

/**
 * Serializes a log field, handling BigInt, circular references and errors.
 */
function safeStringify(arg: unknown): string {
  if (typeof arg === "object" && arg !== null) {
    // JSON.stringify(new Error("x")) returns "{}"
    if (arg instanceof Error) {
      return util.inspect(arg, { depth: 2, breakLength: Infinity });
    }
    try {
      return JSON.stringify(arg);
    } catch {
      return util.inspect(arg, { depth: 2, breakLength: Infinity });
    }
  }
  if (typeof arg === "string") {
    return arg;
  }
  return util.inspect(arg);
}

const CONSOLE_METHODS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Formats a log line. Structured lines are a single JSON object; plain lines
 * append `key=value` pairs after the message.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  fields: Record<string, unknown>,
  structured: boolean,
): string {
  if (structured) {
    const serializable: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(fields)) {
      serializable[key] = typeof value === "bigint" ? value.toString() : value;
    }
    return JSON.stringify({
      level,
      message,
      ...serializable,
      timestamp: new Date().toISOString(),
    });
  }
  const suffix = Object.entries(fields)
    .map(([key, value]) => `${key}=${safeStringify(value)}`)
    .join(" ");
  return suffix.length > 0 ? `${message} ${suffix}` : message;
}

/**
 * Logs a message for the mapping layer through the console.
 * Debug lines are dropped unless the level is "debug"; everything is dropped
 * when logging is disabled.
 */
export const mapperLog = (
  message: string,
  fields: Record<string, unknown> = {},
  level: LogLevel = "info",
) => {
  const settings = getLogSettings();
  if (settings.disabled) return;
  if (level === "debug" && settings.level !== "debug") return;
  CONSOLE_METHODS[level](
    formatLogLine(level, message, fields, settings.structured),
  );
};
