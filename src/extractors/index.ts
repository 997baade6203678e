import { basename, dirname, join } from "path";
import { createLogger } from "../logger";
import { formatDate } from "../utils/date";
import {
  extractAndroidDate,
  extractDatePrefixedDate,
  extractTimestampUuidDate,
  extractWhatsAppDate,
} from "./patterns";

export {
  extractAndroidDate,
  extractDatePrefixedDate,
  extractTimestampUuidDate,
  extractWhatsAppDate,
  resolveDateParts,
} from "./patterns";

const log = createLogger("extractors");

export type DateExtractor = (filePath: string, now: Date) => Date | null;

const SCREENSHOT_PREFIXES = ["Screenshot_", "Screenshot-", "Screenshot "];

/**
 * Screenshot_20190818-130841.png: strip the prefix and run the full
 * extraction again on what is left, in the same directory.
 */
export function extractScreenshotDate(filePath: string, now: Date): Date | null {
  const filename = basename(filePath);
  const prefix = SCREENSHOT_PREFIXES.find((p) => filename.startsWith(p));
  if (!prefix) return null;

  return extractDate(join(dirname(filePath), filename.slice(prefix.length)), now);
}

/** Tried in order, first accepted date wins. */
export const EXTRACTORS: ReadonlyArray<{ name: string; extract: DateExtractor }> = [
  { name: "whatsapp", extract: extractWhatsAppDate },
  { name: "android", extract: extractAndroidDate },
  { name: "date-prefixed", extract: extractDatePrefixedDate },
  { name: "timestamp-uuid", extract: extractTimestampUuidDate },
  { name: "screenshot", extract: extractScreenshotDate },
];

/**
 * Extract a date from the last segment of a path. Dates later than `now`
 * are discarded and the next extractor is tried.
 */
export function extractDate(filePath: string, now: Date = new Date()): Date | null {
  for (const { name, extract } of EXTRACTORS) {
    const date = extract(filePath, now);
    if (!date) continue;

    if (date > now) {
      log.debug({ path: filePath, extractor: name, date: formatDate(date) }, "Discarding extracted date in the future");
      continue;
    }

    log.trace({ path: filePath, extractor: name, date: formatDate(date) }, "Extracted date");
    return date;
  }

  return null;
}

/**
 * Extract a date from the name of the folder containing `filePath`.
 */
export function extractDateFromFolder(filePath: string, now: Date = new Date()): Date | null {
  const folder = dirname(filePath);
  const date = extractDate(folder, now);
  if (date) {
    log.debug({ path: filePath, folder, date: formatDate(date) }, "Using folder date");
  }
  return date;
}
