#!/usr/bin/env node
/**
 * Quire CLI entry point.
 */

import { Command } from "commander";
import { ExitCodes } from "./lib/models.js";
import { initCommand } from "./commands/init.js";
import { buildCommand } from "./commands/build.js";
import { checkCommand } from "./commands/check.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("quire")
  .description("Static site build engine with incremental rebuilds")
  .version(VERSION, "-V, --version", "output the version number")
  .option("--root <path>", "directory to start looking for site.toml")
  .option("--config <path>", "path to site.toml")
  .option("--json", "output in JSON format")
  .option("-q, --quiet", "suppress non-essential output")
  .option("-v, --verbose", "show detailed output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.quiet && opts.verbose) {
      console.error("Error: --quiet and --verbose are mutually exclusive");
      process.exit(ExitCodes.USAGE_ERROR);
    }
  });

program.addCommand(initCommand);
program.addCommand(buildCommand);
program.addCommand(checkCommand);

program.on("command:*", () => {
  console.error(`Error: Unknown command '${program.args[0]}'`);
  console.error('Run "quire --help" for available commands.');
  process.exit(ExitCodes.USAGE_ERROR);
});

program.parseAsync(process.argv).catch((err: Error) => {
  if (process.env.DEBUG) {
    console.error(err);
  } else {
    console.error(`Error: ${err.message}`);
  }
  process.exit(ExitCodes.FAILURE);
});
