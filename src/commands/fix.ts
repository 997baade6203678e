import ora from "ora";
import cliProgress from "cli-progress";
import { basename, dirname } from "path";
import { statSync } from "fs";
import { loadConfig, resolveRunSettings, type FixCliOptions, type RunSettings } from "../config";
import { ConfigError, MissingDependencyError } from "../errors";
import { createLogger, setLogLevel } from "../logger";
import { Exiftool, createMetadataAccessors } from "../metadata";
import { DateReconciler } from "../pipeline/reconciler";
import { runReconciliation, type ProgressCallback, type RunStats } from "../pipeline/runner";
import { LocalFileSource } from "../sources/local";
import { CancellationToken, cancelOnSignals } from "../utils/cancellation";
import { printStatsTable } from "../utils/table";

const log = createLogger("fix");

function loadSettings(options: FixCliOptions): RunSettings {
  const settings = resolveRunSettings(loadConfig(), options);
  const { kind, path } = settings.target;

  let stats;
  try {
    stats = statSync(path);
  } catch {
    throw ConfigError.targetNotFound(path);
  }
  if (kind === "file" ? !stats.isFile() : !stats.isDirectory()) {
    throw ConfigError.targetKindMismatch(path, kind);
  }

  return settings;
}

export async function fixCommand(options: FixCliOptions): Promise<void> {
  let settings: RunSettings;
  try {
    settings = loadSettings(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  setLogLevel(settings.logLevel);
  const spinner = ora();

  const exiftool = new Exiftool();
  spinner.start("Checking exiftool installation...");
  try {
    await exiftool.assertInstalled();
  } catch (error) {
    if (error instanceof MissingDependencyError) {
      spinner.fail(error.message);
      console.error(`\nInstall ${error.dependency} to read and write EXIF dates:`);
      console.error("  brew install exiftool");
      console.error("  # or: apt install libimage-exiftool-perl");
      process.exit(1);
    }
    throw error;
  }
  spinner.succeed("exiftool is installed");

  const { target } = settings;
  const source =
    target.kind === "file"
      ? new LocalFileSource(dirname(target.path), {
          exclude: [...settings.exclude],
          explicitFiles: [target.path],
        })
      : new LocalFileSource(target.path, { exclude: [...settings.exclude] });

  const reconciler = new DateReconciler(createMetadataAccessors(exiftool), {
    dryRun: settings.dryRun,
    fixFutureDates: settings.fixFutureDates,
    extensions: settings.extensions,
  });

  if (settings.dryRun) {
    console.log("[Dry run] No files will be modified.");
  }

  let progressBar: cliProgress.SingleBar | undefined;
  let onProgress: ProgressCallback | undefined;

  if (target.kind === "directory" && settings.progress) {
    spinner.start("Counting files...");
    const total = await source.count();
    spinner.succeed(`Found ${total} files in ${target.path}`);

    const bar = new cliProgress.SingleBar(
      {
        format: "Fixing |{bar}| {percentage}% | {value}/{total} | Errors: {errors} | {file}",
        barsize: settings.progressBarWidth,
        stream: process.stdout,
      },
      cliProgress.Presets.shades_classic
    );
    bar.start(total, 0, { errors: 0, file: "" });
    progressBar = bar;
    onProgress = (progress) => {
      bar.update(progress.processed, { errors: progress.errors, file: basename(progress.currentFile) });
    };
  }

  const token = new CancellationToken();
  const removeSignalHandlers = cancelOnSignals(token, (signal) => {
    log.info({ signal }, "Received signal, finishing current file");
  });

  let stats: RunStats;
  try {
    stats = await runReconciliation(source, reconciler, { token, onProgress });
  } finally {
    progressBar?.stop();
    removeSignalHandlers();
  }

  if (stats.cancelled) {
    console.log(`\nStopped after ${stats.filesProcessed} files (${token.cancelReason}).`);
  }

  console.log(
    `\n${settings.dryRun ? "Would set" : "Set"} ${stats.embeddedWritten} EXIF dates and ` +
      `${stats.filesystemWritten} modified times (${stats.unresolved} unresolved, ${stats.errors} errors)`
  );

  if (settings.printStats) {
    console.log();
    printStatsTable(stats, source);
  }
}
