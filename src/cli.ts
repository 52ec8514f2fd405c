#!/usr/bin/env node
/**
 * zettel-export CLI entry point.
 *
 * Converts the files of a directory into zettel for a zettel note store.
 */

import { Command } from "commander";
import { ExitCodes } from "./lib/models.js";
import { exportCommand } from "./commands/export.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("zettel-export")
  .description("Convert a directory of files into zettel with metadata")
  .version(VERSION, "-V, --version", "output the version number")
  .option("--json", "output the export result in JSON format")
  .option("-q, --quiet", "suppress diagnostics")
  .option("-v, --verbose", "print one line per exported zettel");

program.addCommand(exportCommand, { isDefault: true });

program.on("command:*", () => {
  console.error(`Error: Unknown command '${program.args[0]}'`);
  console.error('Run "zettel-export --help" for available commands.');
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
