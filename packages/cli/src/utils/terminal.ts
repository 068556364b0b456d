import { readFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import { isEditorError } from "@linebuf/core";

export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

/**
 * Read the whole script from a file, or from stdin when the path is absent or
 * "-". An interactive stdin reads as an empty script.
 */
export async function readScript(
  scriptPath?: string,
  stdin: Readable & { isTTY?: boolean } = process.stdin
): Promise<string> {
  if (scriptPath && scriptPath !== "-") {
    return readFile(scriptPath, "utf8");
  }
  if (stdin.isTTY) {
    return "";
  }

  stdin.setEncoding("utf8");
  let script = "";
  for await (const chunk of stdin) {
    script += String(chunk);
  }
  return script;
}

/**
 * Message to print for a failed run, or null when the buffer already logged it.
 * Precondition failures are logged at `error` by the buffer before it throws.
 */
export function describeFailure(error: unknown): string | null {
  if (isEditorError(error)) {
    return error.category === "precondition" ? null : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
