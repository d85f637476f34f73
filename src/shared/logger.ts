/**
 * Logger interface that implements all log levels.
 * Use the {@link LogLevel} when configuring to change which level to output.
 *
 * All methods should be pre-bound to the logger so they can be called from the level-filtered object.
 */
export interface ILogger {
  debug(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;

  group(...label: unknown[]): void;
  groupEnd(): void;
}

export enum LogLevel {
  debug = 0,
  info = 1,
  warn = 2,
  error = 3,
  silent = 4,
}

export interface ILogConfig {
  readonly logger: ILogger;
  readonly level: LogLevel;
}

function noopLog() {}
export function buildLeveledLogger({ level, logger }: ILogConfig): ILogger {
  return {
    debug: level <= LogLevel.debug ? logger.debug.bind(logger) : noopLog,
    info: level <= LogLevel.info ? logger.info.bind(logger) : noopLog,
    warn: level <= LogLevel.warn ? logger.warn.bind(logger) : noopLog,
    error: level <= LogLevel.error ? logger.error.bind(logger) : noopLog,
    group: level < LogLevel.silent ? logger.group.bind(logger) : noopLog,
    groupEnd: level < LogLevel.silent ? logger.groupEnd.bind(logger) : noopLog,
  };
}

/** `console`, filtered to warnings and errors. */
export const defaultLogger: ILogger = buildLeveledLogger({ logger: console, level: LogLevel.warn });

/** Discards everything; handy for tests and batch runs. */
export const silentLogger: ILogger = buildLeveledLogger({ logger: console, level: LogLevel.silent });
