/**
 * Error Code Registry
 *
 * Standardized error codes for script parsing and buffer operations.
 * Every fatal condition raised by the engine or the CLI carries one of these codes.
 */

// ============================================================================
// Error Code Ranges
// ============================================================================

/**
 * Editor Error Codes
 *
 * Ranges:
 * - 1000-1999: Script errors
 * - 2000-2999: Apply precondition errors
 * - 3000-3999: Buffer lifecycle errors
 * - 4000-4999: Configuration errors
 */
export enum EditorErrorCodes {
  // ============================================================================
  // 1000-1999: Script
  // ============================================================================

  /** First line of the script is not a non-negative integer */
  SCRIPT_HEADER_INVALID = 1001,

  // ============================================================================
  // 2000-2999: Apply preconditions
  // ============================================================================

  /** More operations supplied than the operation ceiling permits */
  OPERATION_LIMIT_EXCEEDED = 2001,
  /** Supplied operation count differs from the declared count */
  OPERATION_COUNT_MISMATCH = 2002,
  /** Running total of deleted characters exceeds the deletion ceiling */
  DELETE_LIMIT_EXCEEDED = 2003,

  // ============================================================================
  // 3000-3999: Buffer lifecycle
  // ============================================================================

  /** Buffer used after its output was read */
  BUFFER_CONSUMED = 3001,

  // ============================================================================
  // 4000-4999: Configuration
  // ============================================================================

  /** Limits or CLI configuration failed validation */
  CONFIG_INVALID = 4001,
  /** Configuration file could not be read */
  CONFIG_UNREADABLE = 4002,
}

// ============================================================================
// Error Class
// ============================================================================

/**
 * Editor error with structured code and metadata
 */
export class EditorError extends Error {
  readonly code: EditorErrorCodes;

  /** Derived from the code range */
  readonly category: EditorErrorCategory;

  readonly context?: Record<string, unknown>;

  readonly timestamp: number;

  constructor(code: EditorErrorCodes, message: string, context?: Record<string, unknown>) {
    super(`[E${code}] ${message}`);
    this.name = "EditorError";
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EditorError);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): EditorErrorJSON {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

export interface EditorErrorJSON {
  name: string;
  code: EditorErrorCodes;
  category: EditorErrorCategory;
  message: string;
  context?: Record<string, unknown>;
  timestamp: number;
}

// ============================================================================
// Error Categories
// ============================================================================

export type EditorErrorCategory = "script" | "precondition" | "lifecycle" | "config" | "unknown";

function getErrorCategory(code: EditorErrorCodes): EditorErrorCategory {
  if (code >= 1000 && code < 2000) {
    return "script";
  }
  if (code >= 2000 && code < 3000) {
    return "precondition";
  }
  if (code >= 3000 && code < 4000) {
    return "lifecycle";
  }
  if (code >= 4000 && code < 5000) {
    return "config";
  }
  return "unknown";
}

// ============================================================================
// Error Factory
// ============================================================================

export function createEditorError(
  code: EditorErrorCodes,
  message: string,
  context?: Record<string, unknown>
): EditorError {
  return new EditorError(code, message, context);
}

export const EditorErrors = {
  scriptHeaderInvalid: (header: string) =>
    createEditorError(
      EditorErrorCodes.SCRIPT_HEADER_INVALID,
      "Script header must be a non-negative operation count",
      { header }
    ),

  operationLimitExceeded: (supplied: number, max: number) =>
    createEditorError(
      EditorErrorCodes.OPERATION_LIMIT_EXCEEDED,
      `The input exceeds the max number of operations permitted. (${max})`,
      { supplied, max }
    ),

  operationCountMismatch: (declared: number, supplied: number) =>
    createEditorError(
      EditorErrorCodes.OPERATION_COUNT_MISMATCH,
      `The declared count doesn't match the number of operations supplied. (count = ${declared}, operations = ${supplied})`,
      { declared, supplied }
    ),

  deleteLimitExceeded: (deleted: number, max: number) =>
    createEditorError(
      EditorErrorCodes.DELETE_LIMIT_EXCEEDED,
      `The input exceeds the max number of characters which can be deleted. (${max})`,
      { deleted, max }
    ),

  bufferConsumed: () =>
    createEditorError(
      EditorErrorCodes.BUFFER_CONSUMED,
      "Buffer output was already read; no further operations are permitted"
    ),

  configInvalid: (issues: string[]) =>
    createEditorError(EditorErrorCodes.CONFIG_INVALID, `Invalid configuration: ${issues.join("; ")}`, {
      issues,
    }),

  configUnreadable: (path: string, reason: string) =>
    createEditorError(
      EditorErrorCodes.CONFIG_UNREADABLE,
      `Cannot read configuration file ${path}: ${reason}`,
      { path }
    ),
};

export function isEditorError(error: unknown): error is EditorError {
  return error instanceof EditorError;
}
