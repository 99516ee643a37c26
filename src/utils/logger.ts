import chalk from 'chalk';
import { config } from '../../config/env';

/**
 * Minimum level a logger emits; `silent` drops everything
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Level recorded on an entry (`success` is emitted at info priority)
 */
export type EntryLevel = Exclude<LogLevel, 'silent'> | 'success';

export interface LogEntry {
  level: EntryLevel;
  message: string;
  timestamp: Date;
  context?: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default `info`; children follow their parent) */
  level?: LogLevel;
  /** Prefix shown as `[context]`; children nest as `parent:child` */
  context?: string;
  /** Prefix lines with an ISO timestamp (default true) */
  timestamps?: boolean;
  /** Colour level labels with chalk (default true) */
  colors?: boolean;
  /** Receives entries instead of the console, e.g. to capture them in tests */
  handler?: (entry: LogEntry) => void;
}

type LoggerSettings = Omit<LoggerOptions, 'level'> & { timestamps: boolean; colors: boolean };

const THRESHOLDS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LevelStyle {
  priority: number;
  paint: (text: string) => string;
  write: (line: string) => void;
}

/* eslint-disable no-console */
const STYLES: Record<EntryLevel, LevelStyle> = {
  debug: { priority: 0, paint: chalk.cyan, write: (line) => console.log(line) },
  info: { priority: 1, paint: chalk.blue, write: (line) => console.log(line) },
  success: { priority: 1, paint: chalk.green, write: (line) => console.log(line) },
  warn: { priority: 2, paint: chalk.yellow, write: (line) => console.warn(line) },
  error: { priority: 3, paint: chalk.red, write: (line) => console.error(line) },
};
/* eslint-enable no-console */

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(THRESHOLDS, value);
}

/**
 * Render an entry as a single console line:
 * `<timestamp> <LEVEL> [context] message {data}`
 */
export function formatEntry(entry: LogEntry, options: { timestamps?: boolean; colors?: boolean } = {}): string {
  const { timestamps = true, colors = true } = options;
  const dim = colors ? chalk.gray : (text: string) => text;
  const parts: string[] = [];

  if (timestamps) {
    parts.push(dim(entry.timestamp.toISOString()));
  }

  const label = entry.level.toUpperCase().padEnd(7);
  parts.push(colors ? STYLES[entry.level].paint(label) : label);

  if (entry.context) {
    parts.push(dim(`[${entry.context}]`));
  }
  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    parts.push(JSON.stringify(entry.data));
  }
  return parts.join(' ');
}

/**
 * Structured logger for the scheduler and its collaborators
 */
export class Logger {
  /** Unset on children, which follow their parent's level */
  private level?: LogLevel;
  private parent?: Logger;
  private readonly settings: LoggerSettings;

  constructor({ level, timestamps = true, colors = true, ...rest }: LoggerOptions = {}) {
    this.level = level;
    this.settings = { ...rest, timestamps, colors };
  }

  /**
   * Logger for a sub-component; contexts nest as `parent:child`
   */
  child(context: string): Logger {
    const parentContext = this.settings.context;
    const logger = new Logger({ ...this.settings, context: parentContext ? `${parentContext}:${context}` : context });
    logger.parent = this;
    return logger;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  success(message: string, data?: Record<string, unknown>): void {
    this.log('success', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /**
   * Log any thrown value at error level
   */
  logError(error: unknown, message?: string): void {
    if (error instanceof Error) {
      this.error(message ?? error.message, { name: error.name, message: error.message, stack: error.stack });
    } else {
      this.error(message ?? String(error), { value: String(error) });
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  private log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {
    const style = STYLES[level];
    if (style.priority < THRESHOLDS[this.getLevel()]) {
      return;
    }

    const { context, handler } = this.settings;
    const entry: LogEntry = { level, message, timestamp: new Date(), context, data };
    if (handler) {
      handler(entry);
    } else {
      style.write(formatEntry(entry, this.settings));
    }
  }
}

/**
 * Logger writing one JSON object per line
 */
export function createJsonLogger(options: Omit<LoggerOptions, 'handler'> = {}): Logger {
  return new Logger({
    ...options,
    colors: false,
    handler: (entry) => {
      // eslint-disable-next-line no-console
      console.log(
        JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: entry.level,
          context: entry.context,
          message: entry.message,
          ...entry.data,
        })
      );
    },
  });
}

let globalLogger: Logger | null = null;

/**
 * Process-wide logger; its level comes from `config.logging.level` (LOG_LEVEL)
 */
export function getGlobalLogger(options?: LoggerOptions): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({ level: config.logging.level, ...options });
  }
  return globalLogger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/**
 * Module logger under the global logger
 */
export function createLogger(context: string): Logger {
  return getGlobalLogger().child(context);
}
