/**
 * @fileOverview: Leveled stderr logger with request-scoped child loggers and an optional JSON-lines file
 * @module: Logger
 * @keyFunctions:
 *   - configure(): Apply the level and log file from the validated configuration
 *   - child(): Logger that stamps bound fields (requestId, collection, tool) on every entry
 *   - debug()/info()/warn()/error(): Leveled output with optional context
 * @dependencies:
 *   - fs: Log file append and rotation
 *   - path: Log directory creation
 * @context: Output goes to stderr only; stdout carries the MCP protocol stream and the CLI's answer. Children share one sink, so configuring the root logger reconfigures every child
 */
import * as fs from 'fs';
import * as path from 'path';

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  /** JSON-lines log file; `null` turns file output off. */
  filePath?: string | null;
  maxFileBytes?: number;
  maxArchives?: number;
}

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  prefix: string;
  message: string;
  context?: LogContext;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? fallback;
}

/**
 * Destination shared by a root logger and all of its children.
 */
export class LogSink {
  level: LogLevel;
  private filePath: string | null = null;
  private maxFileBytes = 10 * 1024 * 1024;
  private maxArchives = 3;

  constructor(level: LogLevel) {
    this.level = level;
  }

  get file(): string | null {
    return this.filePath;
  }

  update(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.maxFileBytes !== undefined) this.maxFileBytes = options.maxFileBytes;
    if (options.maxArchives !== undefined) this.maxArchives = options.maxArchives;
    if (options.filePath !== undefined) {
      const file = options.filePath;
      this.filePath = file;
      if (file) {
        this.guardFile(() => fs.mkdirSync(path.dirname(file), { recursive: true }));
      }
    }
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  write(entry: LogEntry): void {
    const line = `[${entry.timestamp}] ${entry.level.toUpperCase()} [${entry.prefix}] ${entry.message}`;
    const rendered = entry.context ? `${line} ${JSON.stringify(entry.context)}` : line;
    if (entry.level === 'warn') {
      console.warn(rendered);
    } else {
      console.error(rendered);
    }

    const file = this.filePath;
    if (file) {
      this.guardFile(() => {
        this.rotate(file);
        fs.appendFileSync(file, `${JSON.stringify(entry)}\n`, { encoding: 'utf8' });
      });
    }
  }

  /**
   * Shift `file.1 .. file.N-1` up by one, drop `file.N` and start a fresh file.
   */
  private rotate(file: string): void {
    if (!fs.existsSync(file) || fs.statSync(file).size < this.maxFileBytes) return;

    const archive = (n: number) => `${file}.${n}`;
    if (fs.existsSync(archive(this.maxArchives))) {
      fs.unlinkSync(archive(this.maxArchives));
    }
    for (let n = this.maxArchives - 1; n >= 1; n--) {
      if (fs.existsSync(archive(n))) {
        fs.renameSync(archive(n), archive(n + 1));
      }
    }
    fs.renameSync(file, archive(1));
  }

  // A broken log file turns file output off and is reported once on stderr
  private guardFile(operation: () => void): void {
    try {
      operation();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[Logger] File logging disabled for ${this.filePath ?? 'unknown file'}: ${reason}`);
      this.filePath = null;
    }
  }
}

export class Logger {
  private readonly sink: LogSink;
  private readonly bound: LogContext;

  constructor(
    private readonly prefix: string,
    options: LoggerOptions = {},
    sink?: LogSink,
    bound: LogContext = {}
  ) {
    this.sink = sink ?? new LogSink(options.level ?? 'info');
    this.bound = bound;
    if (!sink) {
      this.sink.update(options);
    }
  }

  get level(): LogLevel {
    return this.sink.level;
  }

  get filePath(): string | null {
    return this.sink.file;
  }

  configure(options: LoggerOptions): void {
    this.sink.update(options);
  }

  child(context: LogContext): Logger {
    return new Logger(this.prefix, {}, this.sink, { ...this.bound, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogEntry['level'], message: string, context?: LogContext): void {
    if (!this.sink.enabled(level)) return;

    const merged = { ...this.bound, ...context };
    this.sink.write({
      timestamp: new Date().toISOString(),
      level,
      prefix: this.prefix,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });
  }
}

// Level applies from the environment until configure() receives the validated configuration
export const logger = new Logger('NamingAssistant', { level: parseLogLevel(process.env.LOG_LEVEL) });
