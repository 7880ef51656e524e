/**
 * Structured logging for derivation runs
 * Entries are kept in memory so a build can report on them afterwards
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  generatorId?: string;
  typeText?: string;
  declaration?: string;
  phase?: string;
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: LogData;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private context: LogContext = {};
  private timers: Map<string, number> = new Map();
  private shouldLog: boolean;

  constructor(level: LogLevel = "info", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Merge keys into the context attached to subsequent entries
   */
  setContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Run `fn` with extra context, restoring the previous context afterwards
   * even when `fn` throws
   */
  withContext<T>(context: Partial<LogContext>, fn: () => T): T {
    const previous = this.context;
    this.context = { ...previous, ...context };
    try {
      return fn();
    } finally {
      this.context = previous;
    }
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * End a timer and log its duration. Returns 0 for an unknown timer.
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.warn(`Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timers.delete(name);
    this.log(level, message, { duration });
    return duration;
  }

  debug(message: string, data?: LogData): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };

    this.entries.push(entry);

    if (this.shouldLog) {
      this.consoleLog(level, this.buildPrefix(entry) + this.formatLog(entry));
    }
  }

  private buildPrefix(entry: LogEntry): string {
    if (!entry.context) return "";

    const parts: string[] = [];
    if (entry.context.phase) parts.push(`[${entry.context.phase}]`);
    if (entry.context.generatorId) parts.push(`<${entry.context.generatorId}>`);
    if (entry.context.declaration) parts.push(entry.context.declaration);
    if (entry.context.typeText) parts.push(`(${entry.context.typeText})`);

    return parts.length > 0 ? parts.join(" ") + ": " : "";
  }

  private formatLog(entry: LogEntry): string {
    if (!entry.data) {
      return entry.message;
    }
    return entry.message + "\n  " + formatData(entry.data);
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForGenerator(generatorId: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.generatorId === generatorId);
  }

  /**
   * Entries at or above `level`
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LEVELS.indexOf(level);
    return this.entries.filter((entry) => LEVELS.indexOf(entry.level) >= index);
  }

  toJSON(): LogEntry[] {
    return this.getEntries();
  }

  clear(): void {
    this.entries = [];
  }

  getSummary(): Record<LogLevel, number> & { totalEntries: number } {
    const count = (level: LogLevel) => this.entries.filter((e) => e.level === level).length;
    return {
      totalEntries: this.entries.length,
      debug: count("debug"),
      info: count("info"),
      warn: count("warn"),
      error: count("error"),
    };
  }
}

export function formatData(data: LogData): string {
  const parts: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (key === "duration" && typeof value === "number") {
      parts.push(`${key}: ${value}ms`);
    } else if (Array.isArray(value)) {
      parts.push(`${key}: [${value.length} items]`);
    } else if (typeof value === "object" && value !== null) {
      parts.push(`${key}: ${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}: ${String(value)}`);
    }
  }

  return parts.join(", ");
}

/**
 * Global logger instance
 */
export const globalLogger = new Logger("info", true);
