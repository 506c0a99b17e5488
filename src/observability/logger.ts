/**
 * Structured Logger
 *
 * Provides structured logging with:
 * - Hierarchical context (child loggers)
 * - Multiple output formats (console, JSON lines, in-memory buffer)
 * - A minimum level per logger tree
 */

/** Log levels for structured logging */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Log entry structure */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context: Record<string, unknown>;
}

/** Output handler interface */
export interface LogOutput {
  write(entry: LogEntry): void;
}

/** Structured logger interface */
export interface StructuredLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  /** Set minimum log level */
  setLevel(level: LogLevel): void;

  /** Add an output handler */
  addOutput(output: LogOutput): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Level and outputs are shared by a logger and all of its children */
interface LoggerCore {
  minLevel: LogLevel;
  outputs: LogOutput[];
}

class StructuredLoggerImpl implements StructuredLogger {
  constructor(
    private readonly core: LoggerCore,
    private readonly context: Record<string, unknown> = {}
  ) {}

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.core.minLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    for (const output of this.core.outputs) {
      try {
        output.write(entry);
      } catch (error) {
        // One failing output must not stop the others
        process.stderr.write(`log output failed: ${String(error)}\n`);
      }
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLoggerImpl(this.core, { ...this.context, ...context });
  }

  setLevel(level: LogLevel): void {
    this.core.minLevel = level;
  }

  addOutput(output: LogOutput): void {
    this.core.outputs.push(output);
  }
}

// ============================================================================
// Output Handlers
// ============================================================================

/** Console output with human-readable formatting, written to stderr */
export class ConsoleOutput implements LogOutput {
  private prefix: string;

  constructor(options: { prefix?: string } = {}) {
    this.prefix = options.prefix ?? 'fleetquery';
  }

  write(entry: LogEntry): void {
    const prefix = `[${this.prefix}]`;
    const levelStr = entry.level.toUpperCase().padEnd(5);

    // Format context as key=value pairs
    const contextStr = Object.keys(entry.context).length > 0
      ? ` ${formatContext(entry.context)}`
      : '';

    // stdout is reserved for results (e.g. --json reports)
    console.error(`${prefix} ${levelStr} ${entry.message}${contextStr}`);
  }
}

/** JSON Lines output for log aggregation */
export class JsonLinesOutput implements LogOutput {
  private stream: { write: (line: string) => void };

  constructor(stream?: { write: (line: string) => void }) {
    this.stream = stream ?? { write: (line) => process.stderr.write(`${line}\n`) };
  }

  write(entry: LogEntry): void {
    const json = JSON.stringify({
      ...entry,
      '@timestamp': entry.timestamp,
    });
    this.stream.write(json);
  }
}

/** Buffer output for testing */
export class BufferOutput implements LogOutput {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }

  find(predicate: (entry: LogEntry) => boolean): LogEntry | undefined {
    return this.entries.find(predicate);
  }

  filter(predicate: (entry: LogEntry) => boolean): LogEntry[] {
    return this.entries.filter(predicate);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export interface CreateLoggerOptions {
  /** Logger prefix for console output */
  prefix?: string;
  /** Minimum log level */
  level?: LogLevel;
  /** Include console output */
  console?: boolean;
  /** Include JSON lines output */
  jsonLines?: boolean;
  /** Custom JSON lines stream */
  jsonStream?: { write: (line: string) => void };
  /** Extra outputs, e.g. a BufferOutput in tests */
  outputs?: LogOutput[];
  /** Initial context */
  context?: Record<string, unknown>;
  /** Silent mode (no outputs) */
  silent?: boolean;
}

/**
 * Create a structured logger with configured outputs
 */
export function createStructuredLogger(options: CreateLoggerOptions = {}): StructuredLogger {
  const outputs: LogOutput[] = [];

  if (!options.silent) {
    if (options.console !== false) {
      outputs.push(new ConsoleOutput({ prefix: options.prefix }));
    }

    if (options.jsonLines) {
      outputs.push(new JsonLinesOutput(options.jsonStream));
    }

    outputs.push(...(options.outputs ?? []));
  }

  return new StructuredLoggerImpl(
    { minLevel: options.level ?? 'info', outputs },
    options.context ?? {}
  );
}

/** Logger that discards everything; the default for library use */
export function silentLogger(): StructuredLogger {
  return createStructuredLogger({ silent: true });
}

// ============================================================================
// Helpers
// ============================================================================

function formatContext(context: Record<string, unknown>): string {
  return Object.entries(context)
    .filter(([key]) => !key.startsWith('_')) // Skip internal keys
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}="${value}"`;
      }
      if (typeof value === 'number' || typeof value === 'boolean') {
        return `${key}=${value}`;
      }
      return `${key}=${JSON.stringify(value)}`;
    })
    .join(' ');
}
