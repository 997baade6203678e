import type { FileSource } from "../sources/types";
import type { DateReconciler, ReconcileResult } from "./reconciler";
import { CancellationToken } from "../utils/cancellation";
import { createLogger } from "../logger";

const log = createLogger("runner");

export interface RunProgress {
  processed: number;
  errors: number;
  currentFile: string;
}

export type ProgressCallback = (progress: RunProgress) => void;

export interface RunStats {
  filesProcessed: number;
  nonImages: number;
  embeddedKept: number;
  embeddedWritten: number;
  filesystemWritten: number;
  unresolved: number;
  errors: number;
  cancelled: boolean;
  elapsedMs: number;
}

export interface RunOptions {
  token?: CancellationToken;
  onProgress?: ProgressCallback;
  onResult?: (result: ReconcileResult) => void;
}

export function emptyStats(): RunStats {
  return {
    filesProcessed: 0,
    nonImages: 0,
    embeddedKept: 0,
    embeddedWritten: 0,
    filesystemWritten: 0,
    unresolved: 0,
    errors: 0,
    cancelled: false,
    elapsedMs: 0,
  };
}

function record(stats: RunStats, result: ReconcileResult): void {
  for (const write of result.writes) {
    if (!write.ok) continue;
    if (write.target === "embedded") stats.embeddedWritten++;
    else stats.filesystemWritten++;
  }
  if (result.writes.some((write) => !write.ok)) stats.errors++;

  switch (result.outcome) {
    case "not-image":
      stats.nonImages++;
      break;
    case "embedded-kept":
      stats.embeddedKept++;
      break;
    case "unresolved":
      stats.unresolved++;
      break;
    default:
      break;
  }
}

/**
 * Reconcile every file the source yields, one at a time. The token is
 * checked before each file; a file already started always finishes.
 */
export async function runReconciliation(
  source: FileSource,
  reconciler: DateReconciler,
  options: RunOptions = {}
): Promise<RunStats> {
  const token = options.token ?? new CancellationToken();
  const stats = emptyStats();
  const startedAt = Date.now();

  for await (const entry of source.scan()) {
    if (token.cancelled) {
      log.info({ reason: token.cancelReason }, "Cancelled, not starting further files");
      stats.cancelled = true;
      break;
    }

    try {
      const result = await reconciler.reconcile(entry.path);
      record(stats, result);
      options.onResult?.(result);
    } catch (error) {
      log.error({ file: entry.path, err: error }, "Failed to process file");
      stats.errors++;
    }

    stats.filesProcessed++;
    options.onProgress?.({
      processed: stats.filesProcessed,
      errors: stats.errors,
      currentFile: entry.path,
    });
  }

  stats.elapsedMs = Date.now() - startedAt;
  return stats;
}
