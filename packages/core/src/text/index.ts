export * from "./limits.js";
export * from "./textBuffer.js";
