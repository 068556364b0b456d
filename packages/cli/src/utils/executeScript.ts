import {
  type BufferLimits,
  EditorErrors,
  type EditorLogger,
  getLogger,
  isApplicable,
  parseScript,
  type PrintSink,
  splitScriptLines,
  TextBuffer,
} from "@linebuf/core";

export interface ExecuteScriptOptions {
  initial?: string;
  limits?: Partial<BufferLimits>;
  /** Pass invalid lines to the buffer instead of dropping them before the count check */
  keepInvalid?: boolean;
  onPrint: PrintSink;
  logger?: EditorLogger;
}

export type ExecuteScriptResult =
  | { status: "ok"; output: string; applied: number; dropped: number }
  | { status: "malformed-header" };

/**
 * Parse and apply a whole script. Prints go to `onPrint` as they happen; the
 * final buffer is returned. Fatal buffer errors propagate to the caller.
 */
export function executeScript(input: string, options: ExecuteScriptOptions): ExecuteScriptResult {
  const logger = options.logger ?? getLogger();
  const parsed = parseScript(input);
  if (!parsed) {
    const [header = ""] = splitScriptLines(input);
    const error = EditorErrors.scriptHeaderInvalid(header);
    logger.warn("parse", `${error.message}; nothing applied`, { code: error.code, header });
    return { status: "malformed-header" };
  }

  const operations = options.keepInvalid
    ? parsed.operations
    : parsed.operations.filter(isApplicable);
  const dropped = parsed.operations.length - operations.length;
  logger.debug("parse", `Parsed ${parsed.operations.length} operation lines`, {
    declaredCount: parsed.declaredCount,
    dropped,
  });

  const buffer = new TextBuffer(options.initial ?? "", parsed.declaredCount, {
    limits: options.limits,
    onPrint: options.onPrint,
    logger,
  });
  buffer.apply(operations);

  return { status: "ok", output: buffer.output(), applied: operations.length, dropped };
}
