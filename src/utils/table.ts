import type { RunStats } from "../pipeline/runner";

export interface WalkCounts {
  walkedDirs: number;
  skippedDirs: number;
  skippedFiles: number;
}

/**
 * Format milliseconds as HH:MM:SS
 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, "0")).join(":");
}

/**
 * Render run statistics as a two-column table.
 */
export function formatStatsTable(stats: RunStats, walk: WalkCounts): string[] {
  const rows: Array<[string, string]> = [
    ["Folders", String(walk.walkedDirs)],
    ["Folders excluded", String(walk.skippedDirs)],
    ["Files excluded", String(walk.skippedFiles)],
    ["Files processed", String(stats.filesProcessed)],
    ["Not images", String(stats.nonImages)],
    ["EXIF date kept", String(stats.embeddedKept)],
    ["EXIF dates set", String(stats.embeddedWritten)],
    ["Modified times set", String(stats.filesystemWritten)],
    ["Unresolved", String(stats.unresolved)],
    ["Errors", String(stats.errors)],
    ["Elapsed time", formatElapsed(stats.elapsedMs)],
  ];

  const labelWidth = Math.max(...rows.map(([label]) => label.length));
  const valueWidth = Math.max(...rows.map(([, value]) => value.length));
  const separator = `+${"-".repeat(labelWidth + 2)}+${"-".repeat(valueWidth + 2)}+`;

  return [
    separator,
    ...rows.map(([label, value]) => `| ${label.padEnd(labelWidth)} | ${value.padStart(valueWidth)} |`),
    separator,
  ];
}

export function printStatsTable(stats: RunStats, walk: WalkCounts): void {
  for (const line of formatStatsTable(stats, walk)) {
    console.log(line);
  }
}
