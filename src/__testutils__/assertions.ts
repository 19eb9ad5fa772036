/**
 * assertions - Custom assertion helpers for contract tests
 */

/**
 * Poll a condition until it becomes true or timeout.
 *
 * @example
 * await assertEventually(() => server.size === 0, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}

/**
 * Resolve after the event loop has drained the given number of turns.
 * Lets setImmediate-scheduled deliveries land.
 */
export async function flushTurns(turns = 5): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Wait for the first emission of an event from an emitter with a typed `once`.
 */
export function nextEvent<T extends unknown[]>(
  subscribe: (listener: (...args: T) => void) => void
): Promise<T> {
  return new Promise((resolve) => subscribe((...args) => resolve(args)));
}
