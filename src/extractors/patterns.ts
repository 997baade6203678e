import { basename } from "path";
import { dateFromParts, toSecondPrecision, type DateParts } from "../utils/date";

/**
 * WhatsApp media: IMG-20250127-WA0006.jpg (day precision).
 */
export function extractWhatsAppDate(filePath: string): Date | null {
  const match = basename(filePath).match(/IMG-(\d{4})(\d{2})(\d{2})-WA\d+/);
  if (!match) return null;

  const [, year, month, day] = match;
  return dateFromParts({ year, month, day, hour: "00", minute: "00", second: "00" });
}

/**
 * Android camera: IMG_20190818_130841.jpg, optionally with a postfix before
 * the extension.
 */
export function extractAndroidDate(filePath: string): Date | null {
  const match = basename(filePath).match(/IMG_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})/);
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match;
  return dateFromParts({ year, month, day, hour, minute, second });
}

// year, month, day, then an optional HHMMSS time introduced by a separator:
//   2021 vacation.jpg, 2020-10.png, 20201010_202557 a.png, 2021-07-14 20_25_57 party.jpg
const DATE_PREFIX_REGEX =
  /^(\d{4})(?:[-_ ]?(\d{2}))?(?:[-_ ]?(\d{2}))?(?:[-_ ](\d{2})[-_]?(\d{2})[-_]?(\d{2}))?(?=[\s\-_a-zA-Z.]|$)/;

/**
 * Fill in missing components of a date prefix. A component may only be
 * present when the next-coarser one is, otherwise the prefix is rejected.
 */
export function resolveDateParts(parts: DateParts): Required<DateParts> | null {
  const { year, month, day, hour, minute, second } = parts;

  if (day !== undefined && month === undefined) return null;
  if (hour !== undefined && day === undefined) return null;
  if (minute !== undefined && hour === undefined) return null;
  if (second !== undefined && minute === undefined) return null;

  return {
    year,
    month: month ?? "01",
    day: day ?? "01",
    hour: hour ?? "00",
    minute: minute ?? "00",
    second: second ?? "00",
  };
}

/**
 * Names starting with a year, optionally followed by month, day and time.
 * Missing components default to the start of the period.
 */
export function extractDatePrefixedDate(filePath: string): Date | null {
  const name = basename(filePath);
  const match = name.match(DATE_PREFIX_REGEX);
  if (!match) return null;

  const [prefix, year, month, day, hour, minute, second] = match;

  // a bare year directly before the extension (2563.jpg) is too likely a counter
  if (name.charAt(prefix.length) === "." && month === undefined) return null;

  const parts = resolveDateParts({ year, month, day, hour, minute, second });
  return parts ? dateFromParts(parts) : null;
}

/**
 * Epoch milliseconds followed by a UUID:
 * 1565000000000-0b2f8a4e-7c1d-4e5f-9a8b-1c2d3e4f5a6b.jpg
 */
export function extractTimestampUuidDate(filePath: string): Date | null {
  const match = basename(filePath).match(
    /^(\d+)-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i
  );
  if (!match) return null;

  const date = new Date(Number(match[1]));
  return isNaN(date.getTime()) ? null : toSecondPrecision(date);
}
