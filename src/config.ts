import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { LOG_LEVELS, type LogLevel } from "./logger";
import { ConfigError } from "./errors";

export const DEFAULT_EXTENSIONS = [
  "jpg", "jpeg", "png", "gif", "bmp", "webp", "tiff", "tif",
  "heic", "heif", "avif", "jfif", "jpe", "jif", "jfi", "raw",
];

const configSchema = z.object({
  fixer: z
    .object({
      exclude: z.array(z.string().min(1)).default([]),
      fixFutureDates: z.number().int().min(0).optional(),
      dryRun: z.boolean().default(false),
      extensions: z.array(z.string().min(1)).default(DEFAULT_EXTENSIONS),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
    })
    .default({}),
  display: z
    .object({
      progressBarWidth: z.number().min(10).max(100).default(20),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

const CONFIG_FILENAME = "photodate.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "photodate");

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getLocalConfigPath(): string {
  return join(process.cwd(), CONFIG_FILENAME);
}

export function getConfigPath(): string {
  const localPath = getLocalConfigPath();
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, "config.yaml");
}

function parseConfig(raw: unknown, source: string): Config {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw ConfigError.invalid(source, issues);
  }
  return result.data;
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!existsSync(configPath)) {
    // Return defaults if no config exists
    return parseConfig({}, "defaults");
  }

  const content = readFileSync(configPath, "utf-8");
  return parseConfig(parseYaml(content), configPath);
}

/**
 * Lowercase extensions without the leading dot.
 */
export function normalizeExtensions(extensions: string[]): Set<string> {
  return new Set(extensions.map((ext) => ext.replace(/^\./, "").toLowerCase()));
}

/** Options accepted by the `fix` command. */
export interface FixCliOptions {
  file?: string;
  directory?: string;
  exclude?: string[];
  logLevel?: LogLevel;
  fixFutureDates?: number;
  dryRun?: boolean;
  progress?: boolean;
  printStats?: boolean;
}

export interface RunTarget {
  kind: "file" | "directory";
  path: string;
}

/** Everything a run needs, fixed once at startup. */
export interface RunSettings {
  readonly target: RunTarget;
  readonly exclude: readonly string[];
  readonly fixFutureDates?: number;
  readonly dryRun: boolean;
  readonly extensions: ReadonlySet<string>;
  readonly logLevel: LogLevel;
  readonly progress: boolean;
  readonly printStats: boolean;
  readonly progressBarWidth: number;
}

/**
 * Merge command-line options over the config file. Exclusions from both
 * sources apply.
 */
export function resolveRunSettings(config: Config, options: FixCliOptions): RunSettings {
  if (options.file && options.directory) {
    throw ConfigError.noTarget();
  }
  const targetPath = options.file ?? options.directory;
  if (!targetPath) {
    throw ConfigError.noTarget();
  }

  const settings: RunSettings = {
    target: {
      kind: options.file ? "file" : "directory",
      path: resolve(targetPath),
    },
    exclude: [...config.fixer.exclude, ...(options.exclude ?? [])],
    fixFutureDates: options.fixFutureDates ?? config.fixer.fixFutureDates,
    dryRun: options.dryRun ?? config.fixer.dryRun,
    extensions: normalizeExtensions(config.fixer.extensions),
    logLevel: options.logLevel ?? config.logging.level,
    progress: options.progress ?? true,
    printStats: options.printStats ?? false,
    progressBarWidth: config.display.progressBarWidth,
  };
  return Object.freeze(settings);
}

export function getDefaultConfig(): string {
  return `# photodate configuration

fixer:
  exclude: []               # Skip any file whose path contains one of these substrings
  # fixFutureDates: 1       # Reset dates more than this many days in the future to now
  dryRun: false             # Log intended changes without writing anything
  extensions:               # Files whose EXIF date is examined (case-insensitive)
${DEFAULT_EXTENSIONS.map((ext) => `    - ${ext}`).join("\n")}

logging:
  level: info               # trace, debug, info, warn, error, silent

display:
  progressBarWidth: 20      # Width of progress bar in characters
`;
}
