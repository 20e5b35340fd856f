/**
 * Structured logging for the serialization and CLI packages
 *
 * Entries go through a LoggerAdapter. The console adapter prints JSON lines in
 * production, coloured lines in development and nothing under NODE_ENV=test.
 * Child loggers prefix their context with the parent's and follow the
 * parent's level until they are given one of their own.
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  SILENT = 99
}

export type LogEnvironment = 'development' | 'production' | 'test';

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  levelName: string;
  timestamp: string;
  message: string;
  context: string;
  metadata?: LogMetadata;
  error?: {
    message: string;
    stack?: string;
    code?: string;
    cause?: unknown;
  };
}

export interface LoggerAdapter {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  context?: string;
  adapter?: LoggerAdapter;
  metadata?: LogMetadata;
}

const RESET = '\x1b[0m';

const LEVEL_COLORS: ReadonlyMap<LogLevel, string> = new Map([
  [LogLevel.DEBUG, '\x1b[36m'],
  [LogLevel.INFO, '\x1b[32m'],
  [LogLevel.WARN, '\x1b[33m'],
  [LogLevel.ERROR, '\x1b[31m'],
  [LogLevel.FATAL, '\x1b[35m']
]);

const LEVEL_NAMES: ReadonlyMap<string, LogLevel> = new Map([
  ['DEBUG', LogLevel.DEBUG],
  ['INFO', LogLevel.INFO],
  ['WARN', LogLevel.WARN],
  ['ERROR', LogLevel.ERROR],
  ['FATAL', LogLevel.FATAL],
  ['SILENT', LogLevel.SILENT]
]);

function indent(text: string): string {
  return `  ${text.replace(/\n/g, '\n  ')}`;
}

/**
 * Writes entries to stdout, or stderr from WARN up
 */
export class ConsoleAdapter implements LoggerAdapter {
  constructor(private readonly environment: LogEnvironment = 'production') {}

  write(entry: LogEntry): void {
    if (this.environment === 'test') {
      return;
    }

    const line = this.environment === 'development' ? toPrettyLine(entry) : toJsonLine(entry);
    const stream = entry.level >= LogLevel.WARN ? process.stderr : process.stdout;
    stream.write(`${line}\n`);
  }
}

function toJsonLine(entry: LogEntry): string {
  const { timestamp, levelName, context, message, metadata, error } = entry;
  return JSON.stringify({
    timestamp,
    level: levelName,
    context,
    message,
    ...metadata,
    ...(error ? { error } : {})
  });
}

function toPrettyLine(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toLocaleTimeString();
  const color = LEVEL_COLORS.get(entry.level) ?? RESET;
  const lines = [`${time} ${color}[${entry.levelName}]${RESET} [${entry.context}] ${entry.message}`];

  if (entry.metadata) {
    lines.push(indent(JSON.stringify(entry.metadata, null, 2)));
  }
  if (entry.error) {
    lines.push(indent(`Error: ${entry.error.message}`));
    if (entry.error.stack) {
      lines.push(indent(entry.error.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Keeps entries in memory
 */
export class BufferAdapter implements LoggerAdapter {
  public logs: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.logs.push(entry);
  }

  clear(): void {
    this.logs = [];
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level === undefined ? this.logs : this.logs.filter(log => log.level === level);
  }
}

/**
 * Parse a level name such as "debug" or "SILENT"
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return value ? LEVEL_NAMES.get(value.toUpperCase()) : undefined;
}

function currentEnvironment(): LogEnvironment {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test' ? env : 'production';
}

function environmentLevel(): LogLevel {
  const configured = parseLogLevel(process.env.LOG_LEVEL);
  if (configured !== undefined) {
    return configured;
  }
  switch (currentEnvironment()) {
    case 'development':
      return LogLevel.DEBUG;
    case 'test':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

function describeError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { message: error.message, stack: error.stack, code, cause: error.cause };
}

function withoutUndefined(metadata: LogMetadata): LogMetadata | undefined {
  const defined = Object.entries(metadata).filter(([, value]) => value !== undefined);
  return defined.length > 0 ? Object.fromEntries(defined) : undefined;
}

export class Logger {
  private readonly context: string;
  private readonly adapter: LoggerAdapter;
  private readonly metadata: LogMetadata;
  private readonly parent?: Logger;
  private level?: LogLevel;

  /**
   * A root logger without a level reads LOG_LEVEL, then NODE_ENV. A logger
   * made by child() has no level of its own until setLevel is called.
   */
  constructor(config: LoggerConfig = {}, parent?: Logger) {
    this.parent = parent;
    this.level = config.level ?? (parent ? undefined : environmentLevel());
    this.context = config.context ?? 'default';
    this.adapter = config.adapter ?? parent?.adapter ?? new ConsoleAdapter(currentEnvironment());
    this.metadata = config.metadata ?? {};
  }

  child(context: string, metadata?: LogMetadata): Logger {
    return new Logger(
      {
        context: `${this.context}:${context}`,
        adapter: this.adapter,
        metadata: { ...this.metadata, ...metadata }
      },
      this
    );
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.emit(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.emit(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.emit(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: unknown, metadata?: LogMetadata): void {
    this.emit(LogLevel.ERROR, message, metadata, describeError(error));
  }

  fatal(message: string, error?: unknown, metadata?: LogMetadata): void {
    this.emit(LogLevel.FATAL, message, metadata, describeError(error));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? LogLevel.INFO;
  }

  private emit(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata,
    error?: LogEntry['error']
  ): void {
    if (level < this.getLevel()) {
      return;
    }

    const entry: LogEntry = {
      level,
      levelName: LogLevel[level],
      timestamp: new Date().toISOString(),
      message,
      context: this.context
    };
    const merged = withoutUndefined({ ...this.metadata, ...metadata });
    if (merged) {
      entry.metadata = merged;
    }
    if (error) {
      entry.error = error;
    }

    this.adapter.write(entry);
  }
}

/**
 * Root logger of the serialization and CLI packages
 */
export const logger = new Logger({ context: 'tallykit' });
