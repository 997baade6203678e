import { stat, utimes } from "fs/promises";
import { floorToEpoch, toSecondPrecision } from "../utils/date";

export async function readFilesystemDate(file: string): Promise<Date> {
  const stats = await stat(file);
  return toSecondPrecision(stats.mtime);
}

/**
 * Set both access and modified time. Near-zero timestamps cause trouble on
 * some filesystems, so anything before EPOCH_FLOOR is raised to it.
 */
export async function writeFilesystemDate(file: string, date: Date): Promise<void> {
  const floored = floorToEpoch(date);
  await utimes(file, floored, floored);
}
