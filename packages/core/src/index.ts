// Errors
export * from "./kernel/index.js";
// Observability
export {
  EditorLogger,
  getLogger,
  isLogLevel,
  setDefaultLogger,
} from "./observability/logger.js";
export { LOG_LEVELS, type LogCategory, type LogEntry, type LogLevel } from "./observability/types.js";
// Operations
export * from "./ops/index.js";
// Buffer engine
export * from "./text/index.js";
