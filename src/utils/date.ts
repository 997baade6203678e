import { format, isValid, parse } from "date-fns";

/** Display and exiftool `-d` format. */
export const DISPLAY_FORMAT = "yyyy-MM-dd HH:mm:ss";

/** Value format of EXIF date tags. */
export const EXIF_FORMAT = "yyyy:MM:dd HH:mm:ss";

/**
 * Timestamps before this (local 1970-01-02 00:00:00) are treated as bogus and
 * replaced by it.
 */
export const EPOCH_FLOOR = new Date(1970, 0, 2, 0, 0, 0);

export interface DateParts {
  year: string;
  month?: string;
  day?: string;
  hour?: string;
  minute?: string;
  second?: string;
}

/**
 * Build a local date from textual components, or null if they do not form a
 * real calendar date and time (e.g. month 13 or February 30).
 */
export function dateFromParts(parts: Required<DateParts>): Date | null {
  const text = `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
  const date = parse(text, DISPLAY_FORMAT, new Date());
  return isValid(date) ? date : null;
}

/**
 * Parse a date printed in DISPLAY_FORMAT, or null.
 */
export function parseDisplayDate(text: string): Date | null {
  const date = parse(text.trim(), DISPLAY_FORMAT, new Date());
  return isValid(date) ? date : null;
}

export function formatDate(date: Date): string {
  return format(date, DISPLAY_FORMAT);
}

export function formatExifDate(date: Date): string {
  return format(date, EXIF_FORMAT);
}

/**
 * Drop sub-second precision.
 */
export function toSecondPrecision(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * Clamp a date to EPOCH_FLOOR.
 */
export function floorToEpoch(date: Date): Date {
  return date < EPOCH_FLOOR ? EPOCH_FLOOR : date;
}
