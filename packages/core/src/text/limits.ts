/**
 * Buffer Limits
 *
 * Ceilings enforced by TextBuffer.apply, independent of the buffer's size.
 */

import { z } from "zod";
import { EditorErrors } from "../kernel/errors.js";

/** Maximum number of operations a single apply call accepts */
export const DEFAULT_MAX_OPERATIONS = 1_000_000;

/** Maximum number of characters all deletes in a single apply call may remove */
export const DEFAULT_MAX_DELETED_CHARS = DEFAULT_MAX_OPERATIONS * 2;

export const BufferLimitsSchema = z.object({
  maxOperations: z.number().int().positive(),
  maxDeletedChars: z.number().int().positive(),
});

export type BufferLimits = z.infer<typeof BufferLimitsSchema>;

export const DEFAULT_BUFFER_LIMITS: Readonly<BufferLimits> = Object.freeze({
  maxOperations: DEFAULT_MAX_OPERATIONS,
  maxDeletedChars: DEFAULT_MAX_DELETED_CHARS,
});

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Merge a partial set of limits over the defaults and validate the result.
 * Throws EditorError (CONFIG_INVALID) when a value is not a positive integer.
 */
export function resolveBufferLimits(overrides: Partial<BufferLimits> = {}): BufferLimits {
  const candidate = {
    maxOperations: overrides.maxOperations ?? DEFAULT_BUFFER_LIMITS.maxOperations,
    maxDeletedChars: overrides.maxDeletedChars ?? DEFAULT_BUFFER_LIMITS.maxDeletedChars,
  };
  const result = BufferLimitsSchema.safeParse(candidate);
  if (!result.success) {
    throw EditorErrors.configInvalid(formatZodIssues(result.error));
  }
  return result.data;
}
