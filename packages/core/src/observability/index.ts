/**
 * Observability
 *
 * Structured logging for parsing and buffer operations.
 */

export * from "./logger.js";
export * from "./types.js";
