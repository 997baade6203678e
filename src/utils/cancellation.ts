/**
 * Cooperative cancellation. Work checks `cancelled` between units and stops
 * starting new ones; nothing in flight is interrupted.
 */
export class CancellationToken {
  private reason: string | null = null;

  get cancelled(): boolean {
    return this.reason !== null;
  }

  get cancelReason(): string | null {
    return this.reason;
  }

  /** Only the first call has an effect. */
  cancel(reason: string): void {
    if (this.reason === null) {
      this.reason = reason;
    }
  }
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGQUIT"];

/**
 * Cancel `token` on the first termination signal. Returns a function that
 * removes the handlers again.
 */
export function cancelOnSignals(
  token: CancellationToken,
  onSignal?: (signal: NodeJS.Signals) => void
): () => void {
  const handler = (signal: NodeJS.Signals) => {
    token.cancel(signal);
    onSignal?.(signal);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, handler);
  }

  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, handler);
    }
  };
}
