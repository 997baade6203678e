import type { MetadataAccessors } from "./types";
import { Exiftool } from "./exiftool";
import { readFilesystemDate, writeFilesystemDate } from "./filesystem";

export type { MetadataAccessors } from "./types";
export { Exiftool } from "./exiftool";

/**
 * Accessors backed by exiftool for embedded dates and fs for modified times.
 */
export function createMetadataAccessors(exiftool: Exiftool = new Exiftool()): MetadataAccessors {
  return {
    readEmbeddedDate: (file) => exiftool.readDateTimeOriginal(file),
    writeEmbeddedDate: (file, date) => exiftool.writeDateTimeOriginal(file, date),
    readFilesystemDate,
    writeFilesystemDate,
  };
}
