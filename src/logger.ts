/**
 * Structured logger.
 *
 * Human-readable lines by default, one JSON object per line with
 * `LOG_FORMAT=json` (useful when the run's output is collected by CI).
 *
 * ```typescript
 * logger.info("Fetched article", { url, length: content.length });
 * const linkLogger = logger.child({ link: 3 });
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface LoggerConfig {
  /** Minimum level to output (default: "info") */
  minLevel?: LogLevel;
  /** Output JSON lines instead of text (default: false) */
  json?: boolean;
  /** Receives each formatted line; defaults to the console method for the level */
  write?: (level: LogLevel, line: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const { minLevel = "info", json = false, write = writeToConsole } = config;
  const minLevelPriority = LOG_LEVEL_PRIORITY[minLevel];

  function formatEntry(entry: LogEntry): string {
    if (json) {
      return JSON.stringify({
        timestamp: entry.timestamp,
        level: entry.level,
        message: entry.message,
        ...entry.context,
      });
    }

    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = `${LEVEL_COLORS[entry.level]}${levelStr}${RESET} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }

    return output;
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < minLevelPriority) {
      return;
    }

    write(
      level,
      formatEntry({
        timestamp: new Date().toISOString(),
        level,
        message,
        context,
      })
    );
  }

  function withContext(base: LogContext): Logger {
    return {
      debug: (message, context) => log("debug", message, { ...base, ...context }),
      info: (message, context) => log("info", message, { ...base, ...context }),
      warn: (message, context) => log("warn", message, { ...base, ...context }),
      error: (message, context) => log("error", message, { ...base, ...context }),
      child: (additional) => withContext({ ...base, ...additional }),
    };
  }

  return withContext({});
}

/**
 * Logger that drops everything, for tests and library callers
 */
export const silentLogger: Logger = createLogger({ write: () => {} });
