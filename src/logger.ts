import { format } from "node:util";
import { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logging surface every component accepts. Extra arguments are formatted
 * with `util.format` semantics and appended to the message.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** Where formatted lines are written. `console` satisfies it. */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  /** Minimum level that is written. Defaults to `"info"`. */
  level?: LogLevel;
  /** Defaults to `console`. */
  sink?: LogSink;
  /** Colour the level tag. Defaults to chalk's terminal detection. */
  color?: boolean;
  /** Clock override, used by tests. */
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LOG_LEVEL_SET: Set<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_SET.has(value);
}

function paintLevel(chalk: ChalkInstance, level: LogLevel): string {
  const tag = level.toUpperCase().padEnd(5);
  switch (level) {
    case "debug":
      return chalk.gray(tag);
    case "info":
      return chalk.cyan(tag);
    case "warn":
      return chalk.yellow(tag);
    case "error":
      return chalk.red.bold(tag);
  }
}

/**
 * Create a named logger.
 *
 * Lines look like `2024-01-15T10:30:45.000Z INFO  [bridge] message`. `warn` and
 * `error` lines go to the sink's `error` stream, the rest to `log`.
 *
 * @param name - Component name shown in brackets.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());
  const chalk =
    options.color === undefined ? new Chalk() : new Chalk({ level: options.color ? 1 : 0 });

  function write(level: LogLevel, message: string, details: unknown[]): void {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    const text = details.length > 0 ? format(message, ...details) : message;
    const line = `${now().toISOString()} ${paintLevel(chalk, level)} [${name}] ${text}`;
    if (level === "warn" || level === "error") {
      sink.error(line);
    } else {
      sink.log(line);
    }
  }

  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
