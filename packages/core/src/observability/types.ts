/**
 * Observability Types
 *
 * Core types for structured logging of parsing and buffer operations.
 */

// ============================================================================
// Correlation
// ============================================================================

/** Correlation context attached to every log entry */
export type CorrelationContext = {
  /** Script source (file path or "stdin") */
  source: string;
  /** Identifier of a single CLI run */
  runId: string;
};

// ============================================================================
// Log Levels & Events
// ============================================================================

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogCategory = "parse" | "apply" | "undo" | "config" | "cli";

/** Structured log entry */
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context: Partial<CorrelationContext>;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};
