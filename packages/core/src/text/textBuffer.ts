import { type EditorError, EditorErrors } from "../kernel/errors.js";
import { type EditorLogger, getLogger } from "../observability/logger.js";
import type { Operation, UndoEntry } from "../ops/types.js";
import { type BufferLimits, resolveBufferLimits } from "./limits.js";

/** Receives one line per in-range print */
export type PrintSink = (line: string) => void;

export type TextBufferOptions = {
  limits?: Partial<BufferLimits>;
  onPrint?: PrintSink;
  logger?: EditorLogger;
};

/** A buffer is open until its output is read, then consumed for good */
export type TextBufferState = "open" | "consumed";

const writeToStdout: PrintSink = (line) => {
  process.stdout.write(`${line}\n`);
};

/** Safe, non-negative integer */
function isWholeNumber(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Character buffer with an undo history of inverse entries.
 *
 * Characters are Unicode code points: lengths, delete counts and print
 * indices never split a surrogate pair.
 *
 * @example
 * const buffer = new TextBuffer("", 2);
 * buffer.apply([Operations.append("hello"), Operations.delete(1)]);
 * buffer.output(); // "hell"
 */
export class TextBuffer {
  private readonly chars: string[];
  private readonly history: UndoEntry[] = [];
  private readonly declaredCount: number;
  private readonly limits: BufferLimits;
  private readonly onPrint: PrintSink;
  private readonly logger: EditorLogger;
  private currentState: TextBufferState = "open";

  constructor(initial: string, declaredCount: number, options: TextBufferOptions = {}) {
    this.chars = Array.from(initial);
    this.declaredCount = declaredCount;
    this.limits = resolveBufferLimits(options.limits);
    this.onPrint = options.onPrint ?? writeToStdout;
    this.logger = options.logger ?? getLogger();
  }

  get length(): number {
    return this.chars.length;
  }

  get historyDepth(): number {
    return this.history.length;
  }

  get state(): TextBufferState {
    return this.currentState;
  }

  /** Current value, without consuming the buffer */
  peek(): string {
    return this.chars.join("");
  }

  /**
   * Apply operations serially, in order.
   *
   * Fails before touching the buffer when the operation count exceeds
   * `maxOperations` or differs from the declared count. Fails mid-run once the
   * characters removed by deletes exceed `maxDeletedChars`; earlier effects stay.
   */
  apply(operations: readonly Operation[]): void {
    this.assertOpen();
    if (operations.length > this.limits.maxOperations) {
      this.fail(EditorErrors.operationLimitExceeded(operations.length, this.limits.maxOperations));
    }
    if (operations.length !== this.declaredCount) {
      this.fail(EditorErrors.operationCountMismatch(this.declaredCount, operations.length));
    }

    this.logger.info("apply", `Applying ${operations.length} operations`, {
      initialLength: this.chars.length,
    });

    let deletedChars = 0;
    for (let index = 0; index < operations.length; index += 1) {
      const op = operations[index];
      switch (op.kind) {
        case "append":
          this.append(op.text);
          break;
        case "delete":
          if (!isWholeNumber(op.count) || op.count > this.chars.length) {
            this.logger.logSkipped("delete", op.count, this.chars.length, index);
            break;
          }
          deletedChars += op.count;
          if (deletedChars > this.limits.maxDeletedChars) {
            this.fail(EditorErrors.deleteLimitExceeded(deletedChars, this.limits.maxDeletedChars));
          }
          this.deleteTrailing(op.count);
          break;
        case "print":
          if (!isWholeNumber(op.index) || op.index < 1 || op.index > this.chars.length) {
            this.logger.logSkipped("print", op.index, this.chars.length, index);
            break;
          }
          this.onPrint(this.chars[op.index - 1]);
          break;
        case "undo":
          this.undo();
          break;
        case "invalid":
          break;
      }
    }

    this.logger.info("apply", "Applied operations", {
      finalLength: this.chars.length,
      historyDepth: this.history.length,
      deletedChars,
    });
  }

  /** Return the final value. The buffer accepts nothing afterwards. */
  output(): string {
    this.assertOpen();
    this.currentState = "consumed";
    return this.chars.join("");
  }

  private append(text: string): void {
    let count = 0;
    for (const char of text) {
      this.chars.push(char);
      count += 1;
    }
    this.history.push({ kind: "undo-append", count });
  }

  private deleteTrailing(count: number): void {
    const removed: string[] = [];
    for (let i = 0; i < count; i += 1) {
      const char = this.chars.pop();
      if (char === undefined) {
        break;
      }
      removed.push(char);
    }
    this.history.push({ kind: "undo-delete", removed });
  }

  private undo(): void {
    const entry = this.history.pop();
    if (!entry) {
      this.logger.logUndo(null);
      return;
    }
    switch (entry.kind) {
      case "undo-append":
        this.chars.length = Math.max(0, this.chars.length - entry.count);
        break;
      case "undo-delete":
        // removed holds removal order; walk it backwards to restore buffer order
        for (let i = entry.removed.length - 1; i >= 0; i -= 1) {
          this.chars.push(entry.removed[i]);
        }
        break;
    }
    this.logger.logUndo(entry.kind, { length: this.chars.length });
  }

  private assertOpen(): void {
    if (this.currentState === "consumed") {
      throw EditorErrors.bufferConsumed();
    }
  }

  private fail(error: EditorError): never {
    this.logger.error("apply", error.message, error, error.context);
    throw error;
  }
}
