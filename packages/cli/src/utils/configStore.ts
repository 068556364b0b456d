import { readFile } from "node:fs/promises";
import path from "node:path";
import { EditorErrors, formatZodIssues, LOG_LEVELS } from "@linebuf/core";
import { z } from "zod";

export const CliConfigSchema = z
  .object({
    maxOperations: z.number().int().positive().optional(),
    maxDeletedChars: z.number().int().positive().optional(),
    keepInvalid: z.boolean().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

export const DEFAULT_CLI_CONFIG: CliConfig = {};

export interface ConfigStoreOptions {
  baseDir?: string;
  fileName?: string;
}

/**
 * Reads a JSON config file. Without a file name there is nothing to read and
 * the defaults apply; a named file that is missing or malformed is an error.
 */
export class ConfigStore {
  private readonly filePath: string | undefined;

  constructor(options: ConfigStoreOptions = {}) {
    const fileName = options.fileName;
    this.filePath =
      fileName && options.baseDir ? path.resolve(options.baseDir, fileName) : fileName;
  }

  async load(): Promise<CliConfig> {
    if (!this.filePath) {
      return { ...DEFAULT_CLI_CONFIG };
    }

    let data: string;
    try {
      data = await readFile(this.filePath, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw EditorErrors.configUnreadable(this.filePath, reason);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw EditorErrors.configUnreadable(this.filePath, reason);
    }

    return parseCliConfig(parsed);
  }
}

export function parseCliConfig(value: unknown): CliConfig {
  const result = CliConfigSchema.safeParse(value);
  if (!result.success) {
    throw EditorErrors.configInvalid(formatZodIssues(result.error));
  }
  return { ...DEFAULT_CLI_CONFIG, ...result.data };
}
