/**
 * Structured logging for the clearprice packages.
 *
 * Entries are plain objects written as one JSON line each. The solver and
 * CLI take a {@link Logger} through their options so callers can capture,
 * silence or redirect output.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is at or
 * above the logger's threshold; {@link LogLevel.SILENT} suppresses output.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Level name, e.g. "DEBUG". */
  level: string;
  message: string;
  /** ISO 8601 timestamp. */
  timestamp: string;
  /** Dotted component path, e.g. "solver.loop". */
  component?: string;
  [key: string]: unknown;
}

/** Sink that receives each emitted {@link LogEntry}. */
export type LogOutput = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/** Name of the environment variable read by {@link logLevelFromEnv}. */
export const LOG_LEVEL_ENV = 'CLEARING_LOG_LEVEL';

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

/**
 * Parse a level name ("debug", "INFO", ...) into a {@link LogLevel}.
 * Returns `undefined` for anything unrecognised.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Resolve the log level from `CLEARING_LOG_LEVEL`, falling back to
 * `fallback` when the variable is unset or unrecognised.
 */
export function logLevelFromEnv(
  fallback: LogLevel = LogLevel.INFO,
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const raw = env[LOG_LEVEL_ENV];
  if (!raw) return fallback;
  return parseLogLevel(raw) ?? fallback;
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

/** Options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Defaults to one JSON line per entry on `console.log`. */
  output?: LogOutput;
}

/**
 * Structured logger with level filtering and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'solver' });
 * log.debug('round', { round: 3, violation: [0, 1] });
 * log.child('matching').info('perfect matching found');
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a logger sharing this logger's level and output, scoped to
   * `parent.component` (or just `component` at the root).
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      output: this.output,
    });
  }

  /** Whether an entry at `level` would currently be emitted. */
  isLevelEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    this.output({
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...fields,
    });
  }
}

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
