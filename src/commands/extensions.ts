import { loadConfig, normalizeExtensions } from "../config";

const ITEMS_PER_LINE = 10;

/**
 * Split extensions into display lines, ITEMS_PER_LINE per line.
 */
export function formatExtensionLines(extensions: Iterable<string>): string[] {
  const sorted = [...extensions].sort();
  const lines: string[] = [];
  for (let i = 0; i < sorted.length; i += ITEMS_PER_LINE) {
    lines.push(`  ${sorted.slice(i, i + ITEMS_PER_LINE).join(" ")}`);
  }
  return lines;
}

/**
 * extensions - Print the file extensions whose EXIF date is examined
 */
export function extensionsCommand(): void {
  const config = loadConfig();
  console.log("Supported file extensions:");
  for (const line of formatExtensionLines(normalizeExtensions(config.fixer.extensions))) {
    console.log(line);
  }
}
