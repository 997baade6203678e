import { readdirSync } from "fs";
import { join } from "path";
import type { FileEntry, FileSource } from "./types";
import { createLogger } from "../logger";

const logger = createLogger("local-source");

export interface LocalFileSourceOptions {
  /** Substrings; any path containing one is skipped (case-sensitive). */
  exclude?: string[];
  /** Specific files to yield instead of walking `root`. */
  explicitFiles?: string[];
}

/**
 * Walks a directory tree depth-first in name order, files of a directory
 * before its subdirectories. Symbolic links are not followed.
 */
export class LocalFileSource implements FileSource {
  name = "local";
  private root: string;
  private exclude: string[];
  private explicitFiles?: string[];
  public skippedFiles = 0;
  public skippedDirs = 0;
  public walkedDirs = 0;

  constructor(root: string, options?: LocalFileSourceOptions) {
    this.root = root;
    this.exclude = options?.exclude ?? [];
    this.explicitFiles = options?.explicitFiles;
  }

  async *scan(): AsyncGenerator<FileEntry> {
    this.skippedFiles = 0;
    this.skippedDirs = 0;
    this.walkedDirs = 0;

    if (this.explicitFiles) {
      for (const filePath of this.explicitFiles) {
        if (this.isExcluded(filePath)) {
          this.skippedFiles++;
          continue;
        }
        yield { path: filePath };
      }
      return;
    }

    yield* this.scanDirectory(this.root);
  }

  async count(): Promise<number> {
    let count = 0;
    for await (const _ of this.scan()) {
      count++;
    }
    return count;
  }

  isExcluded(path: string): boolean {
    return this.exclude.some((pattern) => path.includes(pattern));
  }

  private *scanDirectory(dirPath: string): Generator<FileEntry> {
    if (this.isExcluded(dirPath)) {
      logger.debug({ directory: dirPath }, "Skipping excluded directory");
      this.skippedDirs++;
      return;
    }

    let entries;
    try {
      entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      logger.error({ directory: dirPath, err: error }, "Cannot read directory");
      return;
    }

    this.walkedDirs++;
    logger.debug({ directory: dirPath }, "Processing directory");

    const files: string[] = [];
    const subdirs: string[] = [];

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        subdirs.push(fullPath);
      } else if (entry.isFile()) {
        if (this.isExcluded(fullPath)) {
          logger.debug({ file: fullPath }, "Skipping excluded file");
          this.skippedFiles++;
          continue;
        }
        files.push(fullPath);
      }
    }

    files.sort();
    for (const file of files) {
      yield { path: file };
    }

    subdirs.sort();
    for (const subdir of subdirs) {
      yield* this.scanDirectory(subdir);
    }
  }
}
