/**
 * Operation Types
 *
 * Commands read from a script, and the inverse entries kept on the undo history.
 */

// ============================================================================
// Operations
// ============================================================================

/** `1 <text>`: append text to the end of the buffer */
export type AppendOperation = { kind: "append"; text: string };

/** `2 <n>`: remove the last n characters */
export type DeleteOperation = { kind: "delete"; count: number };

/** `3 <i>`: print the character at 1-based index i */
export type PrintOperation = { kind: "print"; index: number };

/** `4`: revert the most recent append or delete */
export type UndoOperation = { kind: "undo" };

/** Any line that is not one of the above. Never applied. */
export type InvalidOperation = { kind: "invalid" };

export type Operation =
  | AppendOperation
  | DeleteOperation
  | PrintOperation
  | UndoOperation
  | InvalidOperation;

export type ApplicableOperation = Exclude<Operation, InvalidOperation>;

export const Operations = {
  append: (text: string): AppendOperation => ({ kind: "append", text }),
  delete: (count: number): DeleteOperation => ({ kind: "delete", count }),
  print: (index: number): PrintOperation => ({ kind: "print", index }),
  undo: (): UndoOperation => ({ kind: "undo" }),
  invalid: (): InvalidOperation => ({ kind: "invalid" }),
};

export function isApplicable(op: Operation): op is ApplicableOperation {
  return op.kind !== "invalid";
}

// ============================================================================
// Undo history
// ============================================================================

/** Inverse of an append: number of trailing characters to remove */
export type UndoAppendEntry = { kind: "undo-append"; count: number };

/**
 * Inverse of a delete: the removed characters in removal order (last character first).
 * They are reversed back into buffer order only when the entry is undone.
 */
export type UndoDeleteEntry = { kind: "undo-delete"; removed: string[] };

export type UndoEntry = UndoAppendEntry | UndoDeleteEntry;

// ============================================================================
// Scripts
// ============================================================================

export type ParsedScript = {
  /** Operation count declared on the first line */
  declaredCount: number;
  operations: Operation[];
};
