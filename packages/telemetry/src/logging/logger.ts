/**
 * Structured Logging
 *
 * JSON or pretty line logging with levels, per-session context and pluggable
 * transports. Every history component logs through a child of the global logger.
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Lower is more verbose */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function writeLine(output: string, stream: "stdout" | "stderr"): void {
  if (typeof process === "undefined") {
    return;
  }
  const target = stream === "stderr" ? process.stderr : process.stdout;
  if (!target) {
    return;
  }
  target.write(`${output}\n`);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 */
  timestamp: string;
  timestampMs: number;
  /** Logger name/category */
  logger: string;
  /** Editing session the entry belongs to */
  sessionId?: string;
  /** History component (store, navigation, autosave, ...) */
  component?: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  durationMs?: number;
}

export interface LogContext {
  sessionId?: string;
  component?: string;
}

export interface ILogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export interface LoggerConfig {
  name: string;
  /** Minimum level written; defaults to info */
  level?: LogLevel;
  transports?: ILogTransport[];
  context?: LogContext;
}

// ============================================================================
// Console Transport
// ============================================================================

export interface ConsoleTransportOptions {
  colors?: boolean;
  /** Human-readable lines instead of JSON */
  pretty?: boolean;
  showTimestamp?: boolean;
  /** "split" sends error and fatal to stderr, everything else to stdout */
  stream?: "split" | "stderr";
}

/**
 * Writes entries to stdout, or stderr for error and fatal.
 */
export class ConsoleTransport implements ILogTransport {
  readonly name = "console";
  private readonly options: Required<ConsoleTransportOptions>;

  private readonly LEVEL_COLORS: Record<LogLevel, string> = {
    trace: "\x1b[90m",
    debug: "\x1b[36m",
    info: "\x1b[32m",
    warn: "\x1b[33m",
    error: "\x1b[31m",
    fatal: "\x1b[35m",
  };

  private readonly RESET = "\x1b[0m";

  constructor(options: ConsoleTransportOptions = {}) {
    this.options = {
      colors: options.colors ?? true,
      pretty: options.pretty ?? false,
      showTimestamp: options.showTimestamp ?? true,
      stream: options.stream ?? "split",
    };
  }

  write(entry: LogEntry): void {
    const output = this.options.pretty ? this.formatPretty(entry) : JSON.stringify(entry);
    const stream =
      this.options.stream === "stderr" || entry.level === "error" || entry.level === "fatal"
        ? "stderr"
        : "stdout";
    writeLine(output, stream);
  }

  formatPretty(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.options.showTimestamp) {
      parts.push(`[${entry.timestamp}]`);
    }

    const level = entry.level.toUpperCase().padEnd(5);
    parts.push(this.options.colors ? `${this.LEVEL_COLORS[entry.level]}${level}${this.RESET}` : level);

    parts.push(`[${entry.logger}]`);
    if (entry.sessionId) {
      parts.push(`[session:${entry.sessionId}]`);
    }
    if (entry.component) {
      parts.push(`[${entry.component}]`);
    }

    parts.push(entry.message);

    if (entry.durationMs !== undefined) {
      parts.push(`(${entry.durationMs}ms)`);
    }
    if (entry.data && Object.keys(entry.data).length > 0) {
      parts.push(JSON.stringify(entry.data));
    }
    if (entry.error) {
      const code = entry.error.code ? ` [${entry.error.code}]` : "";
      parts.push(`\n  ${entry.error.name}${code}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n${entry.error.stack}`);
      }
    }

    return parts.join(" ");
  }
}

// ============================================================================
// Memory Transport (for testing)
// ============================================================================

export class MemoryTransport implements ILogTransport {
  readonly name = "memory";
  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  getEntriesBySession(sessionId: string): LogEntry[] {
    return this.entries.filter((e) => e.sessionId === sessionId);
  }

  find(predicate: (entry: LogEntry) => boolean): LogEntry[] {
    return this.entries.filter(predicate);
  }

  clear(): void {
    this.entries.length = 0;
  }

  get size(): number {
    return this.entries.length;
  }
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  readonly name: string;
  readonly level: LogLevel;
  private readonly transports: ILogTransport[];
  private readonly context: LogContext;

  constructor(config: LoggerConfig) {
    this.name = config.name;
    this.level = config.level ?? "info";
    this.transports = config.transports ?? [new ConsoleTransport({ pretty: true })];
    this.context = config.context ?? {};
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, extractError(error));
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, extractError(error));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  timed(level: LogLevel, message: string, durationMs: number, data?: Record<string, unknown>): void {
    this.log(level, message, data, undefined, durationMs);
  }

  /**
   * Measures wall time until `stop` and logs it.
   */
  startTimer(
    message: string,
    level: LogLevel = "debug"
  ): { stop: (data?: Record<string, unknown>) => void } {
    const start = Date.now();
    return {
      stop: (data?: Record<string, unknown>) => {
        this.timed(level, message, Date.now() - start, data);
      },
    };
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({
      name: this.name,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  named(name: string): Logger {
    return new Logger({
      name,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  forSession(sessionId: string): Logger {
    return this.child({ sessionId });
  }

  forComponent(component: string): Logger {
    return this.child({ component });
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: LogEntry["error"],
    durationMs?: number
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const now = new Date();
    const entry: LogEntry = {
      level,
      message,
      timestamp: now.toISOString(),
      timestampMs: now.getTime(),
      logger: this.name,
      sessionId: this.context.sessionId,
      component: this.context.component,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
      error,
      durationMs,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch {
        // Transport failures never reach the caller
      }
    }
  }
}

function extractError(error: unknown): LogEntry["error"] | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }

  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    };
  }

  return { name: "Error", message: String(error) };
}

// ============================================================================
// Global Logger
// ============================================================================

const ROOT_LOGGER_NAME = "inktrail";

let globalLogger: Logger | null = null;

export function getLogger(name?: string): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      name: ROOT_LOGGER_NAME,
      level: "info",
      transports: [new ConsoleTransport({ pretty: true })],
    });
  }

  return name ? globalLogger.named(name) : globalLogger;
}

export function configureLogger(config: Omit<LoggerConfig, "name"> & { name?: string }): Logger {
  globalLogger = new Logger({
    ...config,
    name: config.name ?? ROOT_LOGGER_NAME,
  });
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger = null;
}

/**
 * Logger named after a subsystem, tagged with the component that owns it.
 * Resolved against the global logger at call time, so configure first.
 */
export function createSubsystemLogger(subsystem: string, component?: string): Logger {
  const logger = getLogger(`${ROOT_LOGGER_NAME}:${subsystem}`);
  return component ? logger.forComponent(component) : logger;
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

export function createConsoleTransport(options?: ConsoleTransportOptions): ConsoleTransport {
  return new ConsoleTransport(options);
}

export function createMemoryTransport(maxEntries?: number): MemoryTransport {
  return new MemoryTransport(maxEntries);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}
