import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

export interface LogFileOptions {
  path: string;
  /** Rotate once the file would grow past this many bytes */
  maxBytes?: number;
  /** Number of rotated copies to keep (`.1` is the newest) */
  backups?: number;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  /** Also write every line (uncoloured) to a rotating file */
  file?: LogFileOptions;
  /** Disable console output, e.g. when only the file sink is wanted */
  console?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  verbose: '\x1b[94m', // Light blue
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;
const DEFAULT_BACKUPS = 5;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Size-rotating append-only sink shared by a logger and its children.
 */
export class RotatingFile {
  private readonly path: string;
  private readonly maxBytes: number;
  private readonly backups: number;

  constructor(options: LogFileOptions) {
    this.path = options.path;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.backups = options.backups ?? DEFAULT_BACKUPS;
    mkdirSync(dirname(this.path), { recursive: true });
  }

  get filePath(): string {
    return this.path;
  }

  write(line: string): void {
    const data = `${line}\n`;
    try {
      if (existsSync(this.path) && statSync(this.path).size + Buffer.byteLength(data) > this.maxBytes) {
        this.rotate();
      }
      appendFileSync(this.path, data, 'utf-8');
    } catch (error) {
      // Logging never throws
      process.stderr.write(`log file write failed: ${error instanceof Error ? error.message : String(error)}\n`);
    }
  }

  private rotate(): void {
    if (this.backups <= 0) {
      rmSync(this.path, { force: true });
      return;
    }
    rmSync(`${this.path}.${this.backups}`, { force: true });
    for (let i = this.backups - 1; i >= 1; i--) {
      const from = `${this.path}.${i}`;
      if (existsSync(from)) {
        renameSync(from, `${this.path}.${i + 1}`);
      }
    }
    renameSync(this.path, `${this.path}.1`);
  }
}

/**
 * Simple logger with levels and optional file output
 */
export class Logger {
  private level: LogLevel;
  private prefix: string;
  private timestamps: boolean;
  private toConsole: boolean;
  private sink: RotatingFile | null;

  constructor(options: LoggerOptions = {}, sink?: RotatingFile | null) {
    this.level = options.level || 'info';
    this.prefix = options.prefix || '';
    this.timestamps = options.timestamps ?? true;
    this.toConsole = options.console ?? true;
    this.sink = sink ?? (options.file ? new RotatingFile(options.file) : null);
  }

  /**
   * Format a log message
   */
  private format(level: LogLevel, ...args: unknown[]): string {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);

    if (this.prefix) {
      parts.push(this.prefix);
    }

    const message = args
      .map((arg) => {
        if (arg instanceof Error) {
          return arg.stack || arg.message;
        }
        if (typeof arg === 'object') {
          return JSON.stringify(arg, null, 2);
        }
        return String(arg);
      })
      .join(' ');

    parts.push(message);

    return parts.join(' ');
  }

  /**
   * Log at a specific level
   */
  private log(level: LogLevel, ...args: unknown[]): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return;
    }

    const formatted = this.format(level, ...args);

    if (this.toConsole) {
      // stderr keeps command output on stdout clean for piping
      console.error(`${LOG_COLORS[level]}${formatted}${RESET}`);
    }

    this.sink?.write(formatted);
  }

  debug(...args: unknown[]): void {
    this.log('debug', ...args);
  }

  verbose(...args: unknown[]): void {
    this.log('verbose', ...args);
  }

  info(...args: unknown[]): void {
    this.log('info', ...args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', ...args);
  }

  error(...args: unknown[]): void {
    this.log('error', ...args);
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Path of the file sink, if one is attached
   */
  get logFile(): string | null {
    return this.sink?.filePath ?? null;
  }

  /**
   * Create a child logger with a new prefix
   */
  child(prefix: string): Logger {
    return new Logger(
      {
        level: this.level,
        prefix: this.prefix ? `${this.prefix}${prefix}` : prefix,
        timestamps: this.timestamps,
        console: this.toConsole,
      },
      this.sink,
    );
  }
}

// Default logger instance
export const logger = new Logger({
  level: isLogLevel(process.env.PROMPTSMITH_LOG_LEVEL) ? process.env.PROMPTSMITH_LOG_LEVEL : 'info',
});
