export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  // Prefix added after the level tag, e.g. "[INFO] [arv-engine] ..."
  scope?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SENSITIVE_KEY_PARTS = ["authorization", "token", "key", "secret", "password", "credential"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// Redact sensitive values from logs
export function redactSensitive(obj: LogMeta): LogMeta {
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEY_PARTS.some((part) => lowerKey.includes(part))) {
      result[key] = "[REDACTED]";
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) =>
        typeof item === "object" && item !== null && !Array.isArray(item)
          ? redactSensitive(toMeta(item))
          : item,
      );
    } else if (typeof value === "object" && value !== null) {
      result[key] = redactSensitive(toMeta(value));
    } else {
      result[key] = value;
    }
  }
  return result;
}

function toMeta(value: object): LogMeta {
  return Object.fromEntries(Object.entries(value));
}

export function formatLine(level: Exclude<LogLevel, "silent">, msg: string, scope?: string): string {
  const tag = `[${level.toUpperCase()}]`;
  return scope ? `${tag} [${scope}] ${msg}` : `${tag} ${msg}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const level: LogLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : "info");
  const threshold = LEVEL_ORDER[level];
  const scope = options.scope;

  // Console methods are looked up per call so test spies see the output
  const emit = (
    lvl: Exclude<LogLevel, "silent">,
    sink: "debug" | "log" | "warn" | "error",
    msg: string,
    meta?: LogMeta,
  ): void => {
    if (LEVEL_ORDER[lvl] < threshold) {
      return;
    }
    const safeMeta = meta ? redactSensitive(meta) : undefined;
    console[sink](formatLine(lvl, msg, scope), safeMeta ? JSON.stringify(safeMeta) : "");
  };

  return {
    debug: (msg, meta) => emit("debug", "debug", msg, meta),
    info: (msg, meta) => emit("info", "log", msg, meta),
    warn: (msg, meta) => emit("warn", "warn", msg, meta),
    error: (msg, meta) => emit("error", "error", msg, meta),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
