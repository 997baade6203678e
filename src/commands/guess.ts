import { resolve } from "path";
import { extractDate, extractDateFromFolder } from "../extractors";
import { formatDate } from "../utils/date";

interface GuessOptions {
  json?: boolean;
}

export interface Guess {
  path: string;
  date: Date | null;
  source: "filename" | "folder" | null;
}

/**
 * Resolve a date for a path the same way `fix` does for files without an
 * EXIF date: filename first, then the containing folder.
 */
export function guessDate(path: string, now: Date = new Date()): Guess {
  const fromName = extractDate(path, now);
  if (fromName) {
    return { path, date: fromName, source: "filename" };
  }

  const fromFolder = extractDateFromFolder(path, now);
  if (fromFolder) {
    return { path, date: fromFolder, source: "folder" };
  }

  return { path, date: null, source: null };
}

/**
 * guess - Show which date would be extracted for each path (nothing is modified)
 */
export function guessCommand(paths: string[], options: GuessOptions = {}): void {
  const now = new Date();
  const guesses = paths.map((p) => guessDate(resolve(p), now));

  if (options.json) {
    console.log(
      JSON.stringify(
        guesses.map((g) => ({ ...g, date: g.date ? formatDate(g.date) : null })),
        null,
        2
      )
    );
    return;
  }

  for (const guess of guesses) {
    const result = guess.date ? `${formatDate(guess.date)}  (${guess.source})` : "no date";
    console.log(`${guess.path}: ${result}`);
  }
}
