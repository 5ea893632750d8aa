/**
 * Structured logging for the daemon and the CLI.
 *
 * Every entry carries the logger name (`subsystem:component`) and, when known,
 * the workspace and scheduled task it concerns. Console output always goes to
 * stderr so command output on stdout stays clean.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_RANK, value);
}

export type LogData = Record<string, unknown>;

export interface LogContext {
  workspace?: string;
  taskId?: string;
}

export interface LogEntry extends LogContext {
  level: LogLevel;
  logger: string;
  message: string;
  /** ISO-8601 */
  time: string;
  data?: LogData;
  error?: { name: string; message: string; code?: string; stack?: string };
}

export interface ILogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  transports?: ILogTransport[];
  context?: LogContext;
}

// ---------------------------------------------------------------------------
// Transports
// ---------------------------------------------------------------------------

export interface ConsoleTransportOptions {
  /** Human-readable lines instead of one JSON object per line */
  pretty?: boolean;
  colors?: boolean;
  showTimestamp?: boolean;
}

const COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};
const RESET = "\x1b[0m";

export class ConsoleTransport implements ILogTransport {
  readonly name = "console";
  private readonly pretty: boolean;
  private readonly colors: boolean;
  private readonly showTimestamp: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? true;
    this.colors = options.colors ?? Boolean(process.stderr.isTTY);
    this.showTimestamp = options.showTimestamp ?? true;
  }

  write(entry: LogEntry): void {
    process.stderr.write(`${this.pretty ? this.formatPretty(entry) : JSON.stringify(entry)}\n`);
  }

  formatPretty(entry: LogEntry): string {
    const level = entry.level.toUpperCase().padEnd(5);
    const head = [
      this.showTimestamp ? entry.time : undefined,
      this.colors ? `${COLORS[entry.level]}${level}${RESET}` : level,
      `[${entry.logger}]`,
      entry.workspace ? `[ws:${entry.workspace}]` : undefined,
      entry.taskId ? `[task:${entry.taskId}]` : undefined,
      entry.message,
      entry.data ? JSON.stringify(entry.data) : undefined,
    ].filter((part): part is string => part !== undefined);

    let line = head.join(" ");
    if (entry.error) {
      const code = entry.error.code ? ` [${entry.error.code}]` : "";
      line += `\n  ${entry.error.name}${code}: ${entry.error.message}`;
    }
    return line;
  }
}

/** Keeps entries in memory; used by tests to assert on what was logged. */
export class MemoryTransport implements ILogTransport {
  readonly name = "memory";
  private readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  getEntries(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter((entry) => entry.level === level) : [...this.entries];
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export class Logger {
  readonly loggerName: string;
  private readonly level: LogLevel;
  private readonly transports: ILogTransport[];
  private readonly context: LogContext;

  constructor(config: LoggerConfig) {
    this.loggerName = config.name;
    this.level = config.level ?? "info";
    this.transports = config.transports ?? [new ConsoleTransport()];
    this.context = config.context ?? {};
  }

  trace(message: string, data?: LogData): void {
    this.emit("trace", message, data);
  }

  debug(message: string, data?: LogData): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.emit("warn", message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    this.emit("error", message, data, describeError(error));
  }

  fatal(message: string, error?: unknown, data?: LogData): void {
    this.emit("fatal", message, data, describeError(error));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  /** Shares level, transports and context with this logger. */
  named(name: string): Logger {
    return this.derive(name, this.context);
  }

  forWorkspace(workspace: string): Logger {
    return this.derive(this.loggerName, { ...this.context, workspace });
  }

  forTask(taskId: string): Logger {
    return this.derive(this.loggerName, { ...this.context, taskId });
  }

  private derive(name: string, context: LogContext): Logger {
    return new Logger({ name, level: this.level, transports: this.transports, context });
  }

  private emit(level: LogLevel, message: string, data?: LogData, error?: LogEntry["error"]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      level,
      logger: this.loggerName,
      message,
      time: new Date().toISOString(),
      ...this.context,
    };
    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }
    if (error) {
      entry.error = error;
    }

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (failure) {
        const reason = failure instanceof Error ? failure.message : String(failure);
        process.stderr.write(`log transport "${transport.name}" failed: ${reason}\n`);
      }
    }
  }
}

function describeError(error: unknown): LogEntry["error"] | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  if (!(error instanceof Error)) {
    return { name: "Error", message: String(error) };
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return code === undefined
    ? { name: error.name, message: error.message, stack: error.stack }
    : { name: error.name, message: error.message, code, stack: error.stack };
}

// ---------------------------------------------------------------------------
// Process-wide logger
// ---------------------------------------------------------------------------

const ROOT_NAME = "burrow";
let rootLogger: Logger | null = null;

export function getLogger(name?: string): Logger {
  rootLogger ??= new Logger({ name: ROOT_NAME });
  return name ? rootLogger.named(name) : rootLogger;
}

export function configureLogger(config: Omit<LoggerConfig, "name">): Logger {
  rootLogger = new Logger({ ...config, name: ROOT_NAME });
  return rootLogger;
}

export function resetLogger(): void {
  rootLogger = null;
}

export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

export function createConsoleTransport(options?: ConsoleTransportOptions): ConsoleTransport {
  return new ConsoleTransport(options);
}

export function createMemoryTransport(): MemoryTransport {
  return new MemoryTransport();
}
