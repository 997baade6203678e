/**
 * Error classes for photodate.
 */

/**
 * Base application error class.
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * A required external tool is not available.
 */
export class MissingDependencyError extends AppError {
  constructor(
    message: string,
    public readonly dependency: string
  ) {
    super(message);
    this.name = "MissingDependencyError";
  }

  static exiftool(): MissingDependencyError {
    return new MissingDependencyError(
      "exiftool is not installed. Make sure it is installed and in your PATH.",
      "exiftool"
    );
  }
}

/**
 * An exiftool invocation exited unsuccessfully.
 */
export class ExiftoolError extends AppError {
  constructor(
    message: string,
    public readonly code: number,
    public readonly stderr: string
  ) {
    super(message);
    this.name = "ExiftoolError";
  }

  static writeFailed(file: string, code: number, stderr: string): ExiftoolError {
    const detail = stderr.trim() || `exit code ${code}`;
    return new ExiftoolError(`Failed to write DateTimeOriginal of ${file}: ${detail}`, code, stderr);
  }
}

/**
 * Invalid configuration file or command-line input.
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }

  static invalid(source: string, issues: string[]): ConfigError {
    return new ConfigError(`Invalid configuration in ${source}:\n  ${issues.join("\n  ")}`);
  }

  static noTarget(): ConfigError {
    return new ConfigError("Specify exactly one of --file <path> or --directory <path>");
  }

  static targetNotFound(path: string): ConfigError {
    return new ConfigError(`Path not found: ${path}`);
  }

  static targetKindMismatch(path: string, expected: "file" | "directory"): ConfigError {
    return new ConfigError(`Not a ${expected}: ${path}`);
  }
}
