import {
  type BufferLimits,
  EditorErrors,
  isLogLevel,
  type LogLevel,
  parseNonNegativeInteger,
  resolveBufferLimits,
} from "@linebuf/core";
import type { CliConfig } from "./configStore.js";

const AUTO_VALUES = new Set(["auto", "default"]);
const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export const ENV_MAX_OPERATIONS = "LINEBUF_MAX_OPERATIONS";
export const ENV_MAX_DELETED_CHARS = "LINEBUF_MAX_DELETED_CHARS";
export const ENV_KEEP_INVALID = "LINEBUF_KEEP_INVALID";
export const ENV_LOG_LEVEL = "LINEBUF_LOG_LEVEL";

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export type Environment = Record<string, string | undefined>;

export interface RunCommandOptions {
  initial?: string;
  maxOperations?: string;
  maxDeleted?: string;
  keepInvalid?: boolean;
  logLevel?: string;
  config?: string;
}

export interface RunSettings {
  initial: string;
  limits: BufferLimits;
  keepInvalid: boolean;
  logLevel: LogLevel;
}

export function resolveRuntimeConfigString(
  primary: string | undefined,
  fallback: unknown,
  envVar?: string,
  env: Environment = process.env
): string | undefined {
  const normalizedPrimary = normalizeValue(primary);
  if (normalizedPrimary) {
    return normalizedPrimary;
  }
  const envValue = envVar ? normalizeValue(env[envVar]) : undefined;
  if (envValue) {
    return envValue;
  }
  if (typeof fallback === "string") {
    return normalizeValue(fallback);
  }
  if (typeof fallback === "number" || typeof fallback === "boolean") {
    return String(fallback);
  }
  return undefined;
}

export function resolveRuntimeConfigInteger(
  label: string,
  primary: string | undefined,
  fallback: unknown,
  envVar?: string,
  env: Environment = process.env
): number | undefined {
  const resolved = resolveRuntimeConfigString(primary, fallback, envVar, env);
  if (resolved === undefined) {
    return undefined;
  }
  const parsed = parseNonNegativeInteger(resolved);
  if (parsed === null) {
    throw EditorErrors.configInvalid([`${label}: expected an integer, got "${resolved}"`]);
  }
  return parsed;
}

export function resolveRuntimeConfigBoolean(
  primary: boolean | undefined,
  fallback: unknown,
  envVar?: string,
  env: Environment = process.env
): boolean {
  if (primary) {
    return true;
  }
  const envValue = envVar ? normalizeValue(env[envVar])?.toLowerCase() : undefined;
  if (envValue && TRUE_VALUES.has(envValue)) {
    return true;
  }
  if (envValue && FALSE_VALUES.has(envValue)) {
    return false;
  }
  return fallback === true;
}

export function resolveLogLevel(
  primary: string | undefined,
  fallback: unknown,
  envVar?: string,
  env: Environment = process.env
): LogLevel {
  const resolved = resolveRuntimeConfigString(primary, fallback, envVar, env)?.toLowerCase();
  if (!resolved) {
    return DEFAULT_LOG_LEVEL;
  }
  if (isLogLevel(resolved)) {
    return resolved;
  }
  throw EditorErrors.configInvalid([`logLevel: unknown level "${resolved}"`]);
}

/**
 * Resolve every run setting as flag, then environment variable, then config file, then default.
 */
export function resolveRunSettings(
  options: RunCommandOptions,
  config: CliConfig,
  env: Environment = process.env
): RunSettings {
  const maxOperations = resolveRuntimeConfigInteger(
    "maxOperations",
    options.maxOperations,
    config.maxOperations,
    ENV_MAX_OPERATIONS,
    env
  );
  const maxDeletedChars = resolveRuntimeConfigInteger(
    "maxDeletedChars",
    options.maxDeleted,
    config.maxDeletedChars,
    ENV_MAX_DELETED_CHARS,
    env
  );

  return {
    initial: options.initial ?? "",
    limits: resolveBufferLimits({ maxOperations, maxDeletedChars }),
    keepInvalid: resolveRuntimeConfigBoolean(
      options.keepInvalid,
      config.keepInvalid,
      ENV_KEEP_INVALID,
      env
    ),
    logLevel: resolveLogLevel(options.logLevel, config.logLevel, ENV_LOG_LEVEL, env),
  };
}

function normalizeValue(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }
  if (AUTO_VALUES.has(trimmed)) {
    return undefined;
  }
  return trimmed;
}
