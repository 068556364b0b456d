import {
  type CorrelationContext,
  LOG_LEVELS,
  type LogCategory,
  type LogEntry,
  type LogLevel,
} from "./types.js";

export type LoggerConfig = {
  minLevel: LogLevel;
  console: boolean;
  handler?: (entry: LogEntry) => void;
  defaultContext?: Partial<CorrelationContext>;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function formatLogValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Error) {
    return value.stack ?? value.message;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function formatLogLine(values: unknown[]): string {
  return values.map(formatLogValue).join(" ");
}

// stdout carries program output, so every log line goes to stderr.
function writeLine(output: string): void {
  if (typeof process === "undefined" || !process.stderr) {
    return;
  }
  process.stderr.write(`${output}\n`);
}

export class EditorLogger {
  private config: LoggerConfig;
  private context: Partial<CorrelationContext>;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      minLevel: config.minLevel ?? "warn",
      console: config.console ?? true,
      handler: config.handler,
      defaultContext: config.defaultContext ?? {},
    };
    this.context = { ...this.config.defaultContext };
  }

  child(ctx: Partial<CorrelationContext>): EditorLogger {
    const c = new EditorLogger(this.config);
    c.context = { ...this.context, ...ctx };
    return c;
  }

  isEnabled(lvl: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[lvl] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  debug(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("debug", cat, msg, data);
  }

  info(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("info", cat, msg, data);
  }

  warn(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("warn", cat, msg, data);
  }

  error(cat: LogCategory, msg: string, err?: Error, data?: Record<string, unknown>): void {
    this.log("error", cat, msg, data, err);
  }

  logSkipped(kind: "delete" | "print", requested: number, length: number, opIndex: number): void {
    this.debug("apply", `Skipped ${kind}: ${requested} out of range (length ${length})`, {
      kind,
      requested,
      length,
      opIndex,
    });
  }

  logUndo(entryKind: string | null, details: Record<string, unknown> = {}): void {
    this.debug(
      "undo",
      entryKind ? `Undo ${entryKind}` : "Undo with empty history",
      { entryKind, ...details }
    );
  }

  private log(
    lvl: LogLevel,
    cat: LogCategory,
    msg: string,
    data?: Record<string, unknown>,
    err?: Error
  ): void {
    if (!this.isEnabled(lvl)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: lvl,
      category: cat,
      message: msg,
      context: this.context,
      data,
      error: err ? { name: err.name, message: err.message, stack: err.stack } : undefined,
    };
    if (this.config.handler) {
      this.config.handler(entry);
    }
    if (this.config.console) {
      this.consoleLog(entry);
    }
  }

  private consoleLog(e: LogEntry): void {
    const p = `[${e.timestamp}] [${e.level.toUpperCase()}] [${e.category}]`;
    const c = e.context.runId ? ` (run:${e.context.runId.slice(0, 8)})` : "";
    const a: unknown[] = [`${p + c} ${e.message}`];
    if (e.data) {
      a.push(e.data);
    }
    if (e.error) {
      a.push(e.error);
    }
    writeLine(formatLogLine(a));
  }
}

let defaultLogger: EditorLogger | null = null;

export function getLogger(): EditorLogger {
  if (!defaultLogger) {
    defaultLogger = new EditorLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: EditorLogger): void {
  defaultLogger = logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
