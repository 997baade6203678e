import { extname } from "path";
import { addDays } from "date-fns";
import { extractDate, extractDateFromFolder } from "../extractors";
import type { MetadataAccessors } from "../metadata/types";
import { createLogger } from "../logger";
import { EPOCH_FLOOR, formatDate } from "../utils/date";

const log = createLogger("reconciler");

export interface ReconcileOptions {
  dryRun: boolean;
  /** Days past now after which a date counts as bogus; undefined disables the fix. */
  fixFutureDates?: number;
  /** Lowercase image extensions without the dot. */
  extensions: ReadonlySet<string>;
  now?: () => Date;
}

/** How the decision procedure ended for one file. */
export type ReconcileOutcome =
  | "not-image"
  | "embedded-floored"
  | "embedded-future-fixed"
  | "embedded-kept"
  | "unresolved"
  | "embedded-from-filesystem"
  | "extracted-applied";

export interface DateWrite {
  target: "embedded" | "filesystem";
  date: Date;
  /** False when the write failed; dry-run writes count as succeeded. */
  ok: boolean;
}

export interface ReconcileResult {
  file: string;
  outcome: ReconcileOutcome;
  /** Intended writes under dry-run, performed ones otherwise. */
  writes: DateWrite[];
  extractedDate?: Date;
}

export class DateReconciler {
  private accessors: MetadataAccessors;
  private options: ReconcileOptions;

  constructor(accessors: MetadataAccessors, options: ReconcileOptions) {
    this.accessors = accessors;
    this.options = options;
  }

  /**
   * Bring the embedded date and modified time of one file in line.
   * Embedded dates that look sane are never overwritten.
   */
  async reconcile(file: string): Promise<ReconcileResult> {
    log.debug({ file }, "Processing file");

    const now = this.options.now?.() ?? new Date();
    const writes: DateWrite[] = [];
    const futureThreshold =
      this.options.fixFutureDates !== undefined ? addDays(now, this.options.fixFutureDates) : null;

    // the value as read; corrections below do not change what later steps compare against
    const filesystemDate = await this.accessors.readFilesystemDate(file);

    if (futureThreshold && filesystemDate > futureThreshold) {
      log.info({ file, date: formatDate(filesystemDate) }, "Modified time is in the future, setting it to now");
      writes.push(await this.setFilesystemDate(file, now));
    }

    if (filesystemDate < EPOCH_FLOOR) {
      log.info({ file, date: formatDate(filesystemDate) }, "Modified time is before 1970-01-02, raising it");
      writes.push(await this.setFilesystemDate(file, EPOCH_FLOOR));
    }

    if (!this.isImage(file)) {
      log.debug({ file }, "Not an image, skipping");
      return { file, outcome: "not-image", writes };
    }

    const embeddedDate = await this.accessors.readEmbeddedDate(file);

    if (embeddedDate && embeddedDate < EPOCH_FLOOR) {
      log.info({ file, date: formatDate(embeddedDate) }, "EXIF date is before 1970-01-02, raising it");
      writes.push(await this.setEmbeddedDate(file, EPOCH_FLOOR));
      return { file, outcome: "embedded-floored", writes };
    }

    if (embeddedDate && futureThreshold && embeddedDate > futureThreshold) {
      log.info({ file, date: formatDate(embeddedDate) }, "EXIF date is in the future, setting it to now");
      writes.push(await this.setEmbeddedDate(file, now));
      return { file, outcome: "embedded-future-fixed", writes };
    }

    if (embeddedDate) {
      log.debug({ file, date: formatDate(embeddedDate) }, "File already has an EXIF date");
      return { file, outcome: "embedded-kept", writes };
    }

    const extractedDate = extractDate(file, now) ?? extractDateFromFolder(file, now);

    if (!extractedDate) {
      log.warn({ file }, "Found no date resolution");
      return { file, outcome: "unresolved", writes };
    }

    // no confidence scoring yet: a matching year is taken to mean the
    // modified time is the more precise of the two
    if (extractedDate.getFullYear() === filesystemDate.getFullYear()) {
      log.info(
        { file, extracted: formatDate(extractedDate), modified: formatDate(filesystemDate) },
        "Modified time matches extracted year, copying it into EXIF"
      );
      writes.push(await this.setEmbeddedDate(file, filesystemDate));
      return { file, outcome: "embedded-from-filesystem", writes, extractedDate };
    }

    log.info({ file, date: formatDate(extractedDate) }, "Applying extracted date");
    writes.push(await this.setEmbeddedDate(file, extractedDate));
    writes.push(await this.setFilesystemDate(file, extractedDate));
    return { file, outcome: "extracted-applied", writes, extractedDate };
  }

  isImage(file: string): boolean {
    const extension = extname(file).slice(1).toLowerCase();
    return extension !== "" && this.options.extensions.has(extension);
  }

  private async setEmbeddedDate(file: string, date: Date): Promise<DateWrite> {
    const write: DateWrite = { target: "embedded", date, ok: true };

    if (this.options.dryRun) {
      log.info({ file, date: formatDate(date) }, "Would set EXIF date");
      return write;
    }

    try {
      await this.accessors.writeEmbeddedDate(file, date);
      log.info({ file, date: formatDate(date) }, "Set EXIF date");
    } catch (error) {
      log.error({ file, date: formatDate(date), err: error }, "Failed to set EXIF date");
      write.ok = false;
    }
    return write;
  }

  private async setFilesystemDate(file: string, date: Date): Promise<DateWrite> {
    const write: DateWrite = { target: "filesystem", date, ok: true };

    if (this.options.dryRun) {
      log.info({ file, date: formatDate(date) }, "Would set modified time");
      return write;
    }

    try {
      await this.accessors.writeFilesystemDate(file, date);
      log.info({ file, date: formatDate(date) }, "Set modified time");
    } catch (error) {
      log.error({ file, date: formatDate(date), err: error }, "Failed to set modified time");
      write.ok = false;
    }
    return write;
  }
}
