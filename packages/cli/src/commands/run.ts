import { randomUUID } from "node:crypto";
import { EditorLogger, setDefaultLogger } from "@linebuf/core";
import { Command } from "commander";
import { ConfigStore } from "../utils/configStore.js";
import { executeScript } from "../utils/executeScript.js";
import { type RunCommandOptions, resolveRunSettings } from "../utils/runtimeOptions.js";
import { readScript, writeStdout } from "../utils/terminal.js";

export function runCommand(): Command {
  return new Command("run")
    .description("Apply an edit script and print the resulting buffer")
    .argument("[script]", "Script file to read (default: stdin)")
    .option("--initial <text>", "Initial buffer value")
    .option("--max-operations <n>", "Maximum operations per script")
    .option("--max-deleted <n>", "Maximum characters all deletes may remove")
    .option("--keep-invalid", "Pass unrecognized lines to the buffer instead of dropping them")
    .option("--log-level <level>", "Log level: debug, info, warn, error")
    .option("-c, --config <path>", "JSON configuration file")
    .action(async (scriptPath: string | undefined, options: RunCommandOptions) => {
      const config = await new ConfigStore({ fileName: options.config }).load();
      const settings = resolveRunSettings(options, config);
      const logger = new EditorLogger({ minLevel: settings.logLevel }).child({
        source: scriptPath ?? "stdin",
        runId: randomUUID(),
      });
      setDefaultLogger(logger);

      const input = await readScript(scriptPath);
      const result = executeScript(input, {
        initial: settings.initial,
        limits: settings.limits,
        keepInvalid: settings.keepInvalid,
        onPrint: writeStdout,
        logger,
      });
      if (result.status === "malformed-header") {
        return;
      }
      writeStdout(result.output);
    });
}
