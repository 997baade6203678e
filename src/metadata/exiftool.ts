import { spawn } from "child_process";
import { createLogger } from "../logger";
import { ExiftoolError, MissingDependencyError } from "../errors";
import { formatExifDate, parseDisplayDate } from "../utils/date";

const log = createLogger("exiftool");

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

export async function runCommand(command: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve) => {
    // own process group: a terminal Ctrl+C must not kill a write in flight
    const proc = spawn(command, args, {
      detached: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data) => {
      stderr += data.toString();
    });

    proc.on("close", (code) => {
      resolve({ stdout, stderr, code: code ?? 1 });
    });

    proc.on("error", (error) => {
      resolve({ stdout, stderr: error.message, code: 1 });
    });
  });
}

/**
 * Reads and writes DateTimeOriginal through the exiftool command line.
 */
export class Exiftool {
  private command: string;
  private leadingArgs: string[];

  /**
   * @param command executable to run
   * @param leadingArgs arguments placed before every invocation's own
   */
  constructor(command: string = "exiftool", leadingArgs: string[] = []) {
    this.command = command;
    this.leadingArgs = leadingArgs;
  }

  private run(args: string[]): Promise<CommandResult> {
    return runCommand(this.command, [...this.leadingArgs, ...args]);
  }

  async isInstalled(): Promise<boolean> {
    const result = await this.run(["-ver"]);
    return result.code === 0;
  }

  async assertInstalled(): Promise<void> {
    if (!(await this.isInstalled())) {
      throw MissingDependencyError.exiftool();
    }
  }

  /**
   * Any failure (unsupported file, missing tag, garbage value) reads as
   * "no date".
   */
  async readDateTimeOriginal(file: string): Promise<Date | null> {
    // -d reformats the value, -s3 prints it without the tag name
    const { stdout, stderr, code } = await this.run([
      "-DateTimeOriginal",
      "-d",
      "%Y-%m-%d %H:%M:%S",
      "-s3",
      file,
    ]);

    if (code !== 0) {
      log.debug({ file, code, stderr: stderr.slice(0, 200) }, "Could not read EXIF date");
      return null;
    }

    const value = stdout.trim();
    if (!value) return null;

    const date = parseDisplayDate(value);
    if (!date) {
      log.debug({ file, value }, "Unparseable EXIF date");
    }
    return date;
  }

  async writeDateTimeOriginal(file: string, date: Date): Promise<void> {
    const args = ["-overwrite_original", `-DateTimeOriginal=${formatExifDate(date)}`, file];

    log.debug({ command: this.command, args }, "Running exiftool");

    const { stderr, code } = await this.run(args);
    if (code !== 0) {
      throw ExiftoolError.writeFailed(file, code, stderr);
    }
  }
}
