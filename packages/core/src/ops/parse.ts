import { type Operation, Operations, type ParsedScript } from "./types.js";

const NON_NEGATIVE_INTEGER = /^\+?[0-9]+$/;
const LEADING_WHITESPACE = /^\s+/;
const LINE_BREAK = /\r?\n/;

/**
 * Parse a non-negative integer: an optional `+` followed by ASCII digits.
 * Returns null for anything else, including values past Number.MAX_SAFE_INTEGER.
 */
export function parseNonNegativeInteger(value: string): number | null {
  if (!NON_NEGATIVE_INTEGER.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Drop the single separator between the command code and its argument.
 * Any further leading whitespace belongs to the argument.
 */
function removeSeparator(rest: string): string {
  const separator = rest.codePointAt(0);
  if (separator === undefined) {
    return rest;
  }
  return rest.slice(String.fromCodePoint(separator).length);
}

function parseDeleteOrPrint(kind: "delete" | "print", argument: string): Operation {
  const value = parseNonNegativeInteger(argument.trim());
  if (value === null) {
    return Operations.invalid();
  }
  return kind === "delete" ? Operations.delete(value) : Operations.print(value);
}

/**
 * Convert one line of input into an Operation. Never throws.
 *
 * @example
 * parseOperation("1 abc");  // { kind: "append", text: "abc" }
 * parseOperation("1  abc"); // { kind: "append", text: " abc" }
 * parseOperation("3 2");    // { kind: "print", index: 2 }
 * parseOperation("5");      // { kind: "invalid" }
 */
export function parseOperation(line: string): Operation {
  const input = line.replace(LEADING_WHITESPACE, "");
  if (input.length === 0) {
    return Operations.invalid();
  }

  const rest = input.slice(1);
  switch (input.charAt(0)) {
    case "1":
      return Operations.append(removeSeparator(rest));
    case "2":
      return parseDeleteOrPrint("delete", removeSeparator(rest));
    case "3":
      return parseDeleteOrPrint("print", removeSeparator(rest));
    case "4":
      return Operations.undo();
    default:
      return Operations.invalid();
  }
}

export function splitScriptLines(input: string): string[] {
  if (input.length === 0) {
    return [];
  }
  const lines = input.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Parse a whole script: the operation count on the first line, then one operation per line.
 * Returns null when the first line is not a non-negative integer.
 * Invalid lines are kept in the result, in input order.
 */
export function parseScript(input: string): ParsedScript | null {
  const lines = splitScriptLines(input);
  if (lines.length === 0) {
    return null;
  }
  const [header, ...body] = lines;
  const declaredCount = parseNonNegativeInteger(header);
  if (declaredCount === null) {
    return null;
  }
  return { declaredCount, operations: body.map(parseOperation) };
}
