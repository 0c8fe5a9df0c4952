/**
 * Interactive signal suppression while the session transport owns the terminal
 *
 * The transport runs in the same process group as the proxy, so a Ctrl-C on
 * the user's terminal reaches both. The proxy ignores these signals until
 * the transport exits and leaves their handling to it.
 */

/**
 * Signals ignored for the lifetime of a transport run on the given platform
 *
 * @param platform - Host platform
 * @returns Signal names
 *
 * @public
 */
export function interactiveSignals(platform: NodeJS.Platform = process.platform): NodeJS.Signals[] {
  return platform === "win32" ? ["SIGINT"] : ["SIGINT", "SIGQUIT", "SIGTSTP"];
}

/**
 * Run an operation with the given signals ignored
 *
 * Listeners are removed when the operation settles, whether it resolves or
 * throws.
 *
 * @param operation - Work to run while the signals are ignored
 * @param signals - Signals to ignore
 * @returns The operation's result
 *
 * @public
 */
export async function withIgnoredSignals<T>(
  operation: () => Promise<T>,
  signals: readonly NodeJS.Signals[] = interactiveSignals(),
): Promise<T> {
  const ignore = (): void => {};

  for (const signal of signals) {
    process.on(signal, ignore);
  }

  try {
    return await operation();
  } finally {
    for (const signal of signals) {
      process.off(signal, ignore);
    }
  }
}
