/**
 * Kernel Module
 *
 * Error registry shared by the parser, the buffer engine and the CLI.
 */

export * from "./errors.js";
