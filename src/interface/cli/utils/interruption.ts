/**
 * SIGINT / SIGTERM handling around a long-running search.
 *
 * The first signal aborts the search at its next step boundary so the engine
 * still saves the adjacency cache; a second signal exits immediately.
 *
 * The signal is checked between steps only. A step already waiting on the
 * request throttle or on a fetch finishes first, which can take up to the
 * configured request timeout.
 */

export const INTERRUPTED_EXIT_CODE = 130;

export async function withInterruption<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.stderr.write(`Received ${signal} again, exiting without saving.\n`);
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    process.stderr.write(`\nReceived ${signal}. Stopping after the current step...\n`);
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  try {
    return await run(controller.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
