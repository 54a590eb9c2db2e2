/**
 * Pino Logger Factory
 *
 * Structured logging for the run engine. Components receive a RuntimeLogger
 * and fall back to a subsystem child of the process-wide default.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty printing through pino-pretty */
  pretty?: boolean;
  /** Bindings included in every record */
  base?: Record<string, unknown>;
  transport?: LoggerOptions["transport"];
  /** Synchronous sink; takes precedence over any transport */
  destination?: DestinationStream;
}

function resolveLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? "info";
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: resolveLevel(process.env.LOG_LEVEL),
  pretty: process.env.NODE_ENV === "development",
  base: {
    service: "tasklane",
  },
};

export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.destination) {
    return pino(options, mergedConfig.destination);
  }

  if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  } else if (mergedConfig.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;

  return wrapLogger(logger);
}

export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export type { Logger } from "pino";

let defaultLogger: RuntimeLogger | null = null;

export function getLogger(): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createRuntimeLogger();
  }
  return defaultLogger;
}

/** Replace the process-wide logger; pass null to reset to the default. */
export function setLogger(logger: RuntimeLogger | null): void {
  defaultLogger = logger;
}

/** Child of the default logger bound to one subsystem. */
export function createSubsystemLogger(subsystem: string): RuntimeLogger {
  return getLogger().child({ subsystem });
}

// ============================================================================
// In-memory capture
// ============================================================================

export interface CapturedLogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export interface CaptureLogger {
  logger: RuntimeLogger;
  records(): CapturedLogRecord[];
  /** Records at or above warn */
  warnings(): CapturedLogRecord[];
}

const WARN_LEVEL = 40;

/** Logger that keeps parsed JSON records in memory. */
export function createCaptureLogger(level: LogLevel = "trace"): CaptureLogger {
  const lines: string[] = [];
  const logger = createRuntimeLogger({
    level,
    destination: {
      write(msg: string) {
        lines.push(msg);
      },
    },
  });

  const records = (): CapturedLogRecord[] =>
    lines.flatMap((line) => {
      const parsed: unknown = JSON.parse(line);
      return isCapturedRecord(parsed) ? [parsed] : [];
    });

  return {
    logger,
    records,
    warnings: () => records().filter((record) => record.level >= WARN_LEVEL),
  };
}

function isCapturedRecord(value: unknown): value is CapturedLogRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}
