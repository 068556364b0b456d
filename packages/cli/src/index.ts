#!/usr/bin/env node
import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { describeFailure, writeStderr } from "./utils/terminal.js";

const program = new Command();

program.name("linebuf").description("Undoable line-command text buffer").version("0.1.0");

program.addCommand(runCommand(), { isDefault: true });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = describeFailure(error);
  if (message !== null) {
    writeStderr(message);
  }
  process.exit(1);
});
