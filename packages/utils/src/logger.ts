/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level will be output
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

// Define log level priority (lower number = higher priority)
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVELS: readonly string[] = Object.values(LogLevel);

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.includes(value);
}

const getTimestamp = () => {
  return new Date().toISOString();
};

const getCurrentLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();

  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  // Default is INFO
  return LogLevel.INFO;
};

// Check if a log at the specified level should be output
const shouldLog = (level: LogLevel): boolean => {
  const currentLevel = getCurrentLogLevel();
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[currentLevel];
};

const colorize = (message: string, level: LogLevel): string => {
  const colors = {
    [LogLevel.ERROR]: "\x1b[31m", // Red
    [LogLevel.WARN]: "\x1b[33m", // Yellow
    [LogLevel.INFO]: "\x1b[36m", // Cyan
    [LogLevel.DEBUG]: "\x1b[32m", // Green
    [LogLevel.LOG]: null, // No color (standard)
  };

  const reset = "\x1b[0m";
  const color = colors[level];

  if (color === null) {
    return message; // No color for LOG
  }

  return `${color}${message}${reset}`;
};

const formatHeader = (level: LogLevel, scope?: string): string => {
  const timestamp = `[${getTimestamp()}]`;
  const levelTag = `[${level}]`;
  const scopeTag = scope ? ` [${scope}]` : "";
  return colorize(`${timestamp} ${levelTag}${scopeTag}`, level);
};

let sink: LogSink | null = null;

function isFieldsObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

function stringifyValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

function toFields(args: unknown[], base: Record<string, string>): Record<string, string> | undefined {
  // Common case in this codebase: logger.info("msg", { ...fields })
  const out: Record<string, string> = { ...base };
  const maybeFields = args[1];
  if (isFieldsObject(maybeFields)) {
    for (const [k, v] of Object.entries(maybeFields)) {
      out[k] = stringifyValue(v);
    }
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;

  const head = stringifyValue(first);

  if (rest.length === 0) return head;

  // Avoid duplicating the common fields object in the message; store it in `fields`.
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;

  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringifyValue).join(" ")}`.trim();
}

function emit(
  level: LogLevel,
  args: unknown[],
  consoleFn: (...a: unknown[]) => void,
  scope: string | undefined,
  base: Record<string, string>,
): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    message: toMessage(args),
    fields: toFields(args, base),
  };

  if (sink) {
    sink.write(record);
    return;
  }

  const header = formatHeader(level, scope);
  consoleFn(header, ...args);
}

export interface Logger {
  log: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /**
   * Derive a logger that tags every record with a scope and fixed fields
   */
  child: (scope: string, fields?: Record<string, string>) => Logger;
}

function createLogger(scope?: string, base: Record<string, string> = {}): Logger {
  return {
    log: (...args: unknown[]) => {
      emit(LogLevel.LOG, args, console.log, scope, base);
    },
    info: (...args: unknown[]) => {
      emit(LogLevel.INFO, args, console.info, scope, base);
    },
    debug: (...args: unknown[]) => {
      emit(LogLevel.DEBUG, args, console.log, scope, base);
    },
    warn: (...args: unknown[]) => {
      emit(LogLevel.WARN, args, console.warn, scope, base);
    },
    error: (...args: unknown[]) => {
      emit(LogLevel.ERROR, args, console.error, scope, base);
    },
    child: (childScope: string, fields: Record<string, string> = {}) =>
      createLogger(scope ? `${scope}:${childScope}` : childScope, { ...base, ...fields }),
  };
}

export const logger = {
  ...createLogger(),
  /**
   * Get the currently set log level
   */
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  /**
   * Get list of available log levels
   */
  getLevels: () => Object.values(LogLevel),
  /**
   * Route logs to a custom sink (e.g., a test collector).
   *
   * When a sink is set, logs are sent to it instead of printing to console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
};
