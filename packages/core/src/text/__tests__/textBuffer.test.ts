import { describe, expect, it } from "vitest";
import { EditorError, EditorErrorCodes } from "../../kernel/errors.js";
import { EditorLogger } from "../../observability/logger.js";
import type { LogEntry } from "../../observability/types.js";
import { type Operation, Operations } from "../../ops/types.js";
import { TextBuffer, type TextBufferOptions } from "../textBuffer.js";

const silent = new EditorLogger({ console: false });

function createBuffer(
  initial: string,
  operations: Operation[],
  options: TextBufferOptions = {}
): { buffer: TextBuffer; printed: string[] } {
  const printed: string[] = [];
  const buffer = new TextBuffer(initial, operations.length, {
    logger: silent,
    onPrint: (line) => printed.push(line),
    ...options,
  });
  return { buffer, printed };
}

function run(initial: string, operations: Operation[]): { value: string; printed: string[] } {
  const { buffer, printed } = createBuffer(initial, operations);
  buffer.apply(operations);
  return { value: buffer.output(), printed };
}

function captureError(fn: () => void): EditorError {
  try {
    fn();
  } catch (error) {
    if (error instanceof EditorError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected an EditorError");
}

describe("TextBuffer", () => {
  describe("append", () => {
    it("appends text to the end", () => {
      expect(run("ab", [Operations.append("cd")]).value).toBe("abcd");
    });

    it("records one history entry per append, including empty text", () => {
      const ops = [Operations.append("x"), Operations.append("")];
      const { buffer } = createBuffer("", ops);
      buffer.apply(ops);

      expect(buffer.historyDepth).toBe(2);
      expect(buffer.peek()).toBe("x");
    });
  });

  describe("delete", () => {
    it("removes trailing characters", () => {
      expect(run("hello", [Operations.delete(2)]).value).toBe("hel");
    });

    it("can remove the whole buffer", () => {
      expect(run("abc", [Operations.delete(3)]).value).toBe("");
    });

    it("skips a delete longer than the buffer without recording history", () => {
      const ops = [Operations.append("ab"), Operations.delete(3)];
      const { buffer } = createBuffer("", ops);
      buffer.apply(ops);

      expect(buffer.peek()).toBe("ab");
      expect(buffer.historyDepth).toBe(1);
    });

    it("skips negative and fractional counts without recording history", () => {
      const ops = [Operations.append("abc"), Operations.delete(-3), Operations.delete(1.5)];
      const { buffer } = createBuffer("", ops);
      buffer.apply(ops);

      expect(buffer.peek()).toBe("abc");
      expect(buffer.historyDepth).toBe(1);
    });
  });

  describe("print", () => {
    it("emits the character at a 1-based index", () => {
      expect(run("abc", [Operations.print(1), Operations.print(3)]).printed).toEqual(["a", "c"]);
    });

    it("skips out-of-range indices", () => {
      const { printed, value } = run("abc", [Operations.print(0), Operations.print(4)]);

      expect(printed).toEqual([]);
      expect(value).toBe("abc");
    });

    it("skips fractional and non-finite indices", () => {
      const { printed } = run("abc", [
        Operations.print(1.5),
        Operations.print(Number.NaN),
        Operations.print(Number.POSITIVE_INFINITY),
        Operations.print(-1),
      ]);

      expect(printed).toEqual([]);
    });

    it("reads the current buffer at the time of the print", () => {
      const { printed } = run("", [
        Operations.append("ab"),
        Operations.print(2),
        Operations.delete(1),
        Operations.print(2),
        Operations.append("z"),
        Operations.print(2),
      ]);

      expect(printed).toEqual(["b", "z"]);
    });
  });

  describe("undo", () => {
    it("reverts an append", () => {
      expect(run("start", [Operations.append("!"), Operations.undo()]).value).toBe("start");
    });

    it("restores deleted characters in buffer order", () => {
      expect(run("", [Operations.append("abcdef"), Operations.delete(4), Operations.undo()]).value).toBe(
        "abcdef"
      );
    });

    it("reverts in last-in first-out order", () => {
      const { value, printed } = run("", [
        Operations.append("abc"),
        Operations.delete(1),
        Operations.append("XY"),
        Operations.undo(),
        Operations.print(2),
        Operations.undo(),
        Operations.undo(),
      ]);

      expect(printed).toEqual(["b"]);
      expect(value).toBe("");
    });

    it("leaves the buffer unchanged when history is empty", () => {
      const ops = [Operations.undo(), Operations.undo()];
      const { buffer } = createBuffer("init", ops);
      buffer.apply(ops);

      expect(buffer.peek()).toBe("init");
      expect(buffer.historyDepth).toBe(0);
    });

    it("does not undo past the initial value", () => {
      expect(run("base", [Operations.delete(2), Operations.undo(), Operations.undo()]).value).toBe(
        "base"
      );
    });
  });

  it("ignores invalid operations", () => {
    const ops = [Operations.append("a"), Operations.invalid(), Operations.undo()];
    const { buffer } = createBuffer("", ops);
    buffer.apply(ops);

    expect(buffer.peek()).toBe("");
    expect(buffer.historyDepth).toBe(0);
  });

  it("counts code points, not UTF-16 units", () => {
    const { value, printed } = run("", [
      Operations.append("a😀b"),
      Operations.print(2),
      Operations.delete(2),
      Operations.print(1),
      Operations.undo(),
      Operations.print(3),
    ]);

    expect(printed).toEqual(["😀", "a", "b"]);
    expect(value).toBe("a😀b");
  });

  describe("preconditions", () => {
    it("rejects more operations than the ceiling before applying any", () => {
      const ops = [Operations.append("a"), Operations.append("b"), Operations.append("c")];
      const { buffer } = createBuffer("", ops, { limits: { maxOperations: 2 } });
      const error = captureError(() => buffer.apply(ops));

      expect(error.code).toBe(EditorErrorCodes.OPERATION_LIMIT_EXCEEDED);
      expect(error.context).toEqual({ supplied: 3, max: 2 });
      expect(buffer.peek()).toBe("");
    });

    it("accepts exactly as many operations as the ceiling", () => {
      const ops = [Operations.append("a"), Operations.append("b")];
      const { buffer } = createBuffer("", ops, { limits: { maxOperations: 2 } });
      buffer.apply(ops);

      expect(buffer.peek()).toBe("ab");
    });

    it("checks the ceiling before the declared count", () => {
      const buffer = new TextBuffer("", 5, { logger: silent, limits: { maxOperations: 1 } });
      const error = captureError(() => buffer.apply([Operations.undo(), Operations.undo()]));

      expect(error.code).toBe(EditorErrorCodes.OPERATION_LIMIT_EXCEEDED);
    });

    it("rejects a count that differs from the declared count", () => {
      const buffer = new TextBuffer("", 2, { logger: silent });
      const error = captureError(() => buffer.apply([Operations.append("a")]));

      expect(error.code).toBe(EditorErrorCodes.OPERATION_COUNT_MISMATCH);
      expect(error.category).toBe("precondition");
      expect(error.message).toBe(
        "[E2002] The declared count doesn't match the number of operations supplied. (count = 2, operations = 1)"
      );
      expect(buffer.peek()).toBe("");
    });

    it("stops once deleted characters exceed the ceiling, keeping earlier effects", () => {
      const printed: string[] = [];
      const ops = [
        Operations.append("abcdef"),
        Operations.delete(2),
        Operations.print(1),
        Operations.delete(2),
        Operations.print(1),
      ];
      const buffer = new TextBuffer("", ops.length, {
        logger: silent,
        limits: { maxDeletedChars: 3 },
        onPrint: (line) => printed.push(line),
      });
      const error = captureError(() => buffer.apply(ops));

      expect(error.code).toBe(EditorErrorCodes.DELETE_LIMIT_EXCEEDED);
      expect(error.context).toEqual({ deleted: 4, max: 3 });
      expect(buffer.peek()).toBe("abcd");
      expect(printed).toEqual(["a"]);
    });

    it("does not count skipped deletes toward the ceiling", () => {
      const ops = [Operations.delete(10), Operations.append("ab"), Operations.delete(2)];
      const { buffer } = createBuffer("", ops, { limits: { maxDeletedChars: 2 } });
      buffer.apply(ops);

      expect(buffer.peek()).toBe("");
    });

    it("does not let a negative delete lower the deleted total", () => {
      const ops = [Operations.append("abcd"), Operations.delete(-3), Operations.delete(4)];
      const { buffer } = createBuffer("", ops, { limits: { maxDeletedChars: 2 } });
      const error = captureError(() => buffer.apply(ops));

      expect(error.code).toBe(EditorErrorCodes.DELETE_LIMIT_EXCEEDED);
      expect(error.context).toEqual({ deleted: 4, max: 2 });
      expect(buffer.peek()).toBe("abcd");
      expect(buffer.historyDepth).toBe(1);
    });

    it("rejects invalid limits at construction", () => {
      const error = captureError(
        () => new TextBuffer("", 0, { logger: silent, limits: { maxOperations: 0 } })
      );

      expect(error.code).toBe(EditorErrorCodes.CONFIG_INVALID);
    });
  });

  describe("lifecycle", () => {
    it("is consumed once output is read", () => {
      const buffer = new TextBuffer("done", 0, { logger: silent });

      expect(buffer.state).toBe("open");
      expect(buffer.output()).toBe("done");
      expect(buffer.state).toBe("consumed");
    });

    it("refuses further use after output", () => {
      const buffer = new TextBuffer("", 0, { logger: silent });
      buffer.output();

      expect(captureError(() => buffer.apply([])).code).toBe(EditorErrorCodes.BUFFER_CONSUMED);
      expect(captureError(() => buffer.output()).code).toBe(EditorErrorCodes.BUFFER_CONSUMED);
    });
  });

  describe("logging", () => {
    it("logs skipped operations at debug level", () => {
      const entries: LogEntry[] = [];
      const logger = new EditorLogger({
        console: false,
        minLevel: "debug",
        handler: (entry) => entries.push(entry),
      });
      const buffer = new TextBuffer("", 2, { logger, onPrint: () => undefined });
      buffer.apply([Operations.delete(5), Operations.print(1)]);

      const skipped = entries.filter((entry) => entry.level === "debug");
      expect(skipped.map((entry) => entry.message)).toEqual([
        "Skipped delete: 5 out of range (length 0)",
        "Skipped print: 1 out of range (length 0)",
      ]);
    });

    it("logs fatal failures at error level before throwing", () => {
      const entries: LogEntry[] = [];
      const logger = new EditorLogger({ console: false, handler: (entry) => entries.push(entry) });
      const buffer = new TextBuffer("", 1, { logger });

      expect(() => buffer.apply([])).toThrow(EditorError);
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe("error");
      expect(entries[0].category).toBe("apply");
      expect(entries[0].error?.name).toBe("EditorError");
      expect(entries[0].data).toEqual({ declared: 1, supplied: 0 });
    });
  });
});
