/**
 * Access to the two date sources of a file. Implementations of the write
 * methods reject on failure; read methods for embedded dates never do.
 */
export interface MetadataAccessors {
  /** DateTimeOriginal, or null when absent or unreadable. */
  readEmbeddedDate(file: string): Promise<Date | null>;
  writeEmbeddedDate(file: string, date: Date): Promise<void>;
  /** Last-modified time at second precision. */
  readFilesystemDate(file: string): Promise<Date>;
  /** Sets modified and access time; dates before EPOCH_FLOOR are floored. */
  writeFilesystemDate(file: string, date: Date): Promise<void>;
}
