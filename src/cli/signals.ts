const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Call `handler` on SIGINT or SIGTERM. Returns a function that removes the
 * listeners again.
 */
export function onShutdownSignal(
  handler: (signal: NodeJS.Signals) => void,
  signals: NodeJS.Signals[] = SHUTDOWN_SIGNALS,
): () => void {
  const listener = (signal: NodeJS.Signals) => handler(signal);
  for (const signal of signals) {
    process.on(signal, listener);
  }
  return () => {
    for (const signal of signals) {
      process.off(signal, listener);
    }
  };
}
