#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { fixCommand } from "./commands/fix";
import { guessCommand } from "./commands/guess";
import { extensionsCommand } from "./commands/extensions";
import { initCommand } from "./commands/init";
import { LOG_LEVELS } from "./logger";

const program = new Command();

program
  .name("photodate")
  .description(
    "Infer missing photo capture dates from file and folder names and reconcile EXIF dates with modified times"
  )
  .version("0.1.0");

// Parse a day count for --fix-future-dates
function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 0) {
    throw new InvalidArgumentError(`Invalid day count '${value}'. Use a non-negative integer.`);
  }
  return days;
}

program
  .command("init")
  .description("Create a default config file")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

program
  .command("fix")
  .description("Fill in missing EXIF dates and repair modified times")
  .addOption(new Option("--file <path>", "Process a single file").conflicts("directory"))
  .addOption(new Option("--directory <path>", "Process a directory recursively").conflicts("file"))
  .option("-e, --exclude <substring...>", "Skip files whose path contains any of these substrings")
  .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS))
  .option(
    "--fix-future-dates <days>",
    "Reset dates more than this many days in the future to now",
    parseDays
  )
  .option("--dry-run", "Show what would be done without making changes")
  .option("--no-progress", "Do not show a progress bar")
  .option("--print-stats", "Print statistics when done")
  .action(fixCommand);

program
  .command("guess")
  .description("Show the date extracted from file or folder names (changes nothing)")
  .argument("<paths...>", "File paths to check")
  .option("--json", "Output as JSON")
  .action(guessCommand);

program
  .command("extensions")
  .description("List the file extensions whose EXIF date is examined")
  .action(extensionsCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
