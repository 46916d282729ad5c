export type Operation = (signal: AbortSignal) => Promise<void>;

/**
 * Run operations through a fixed number of workers pulling from one queue.
 * Every operation gets the pool's signal. The first failure aborts it, so
 * running siblings stop at their next await, and the call rejects with that
 * failure once they have settled.
 */
export async function runPool(
  operations: Operation[],
  concurrency: number,
  signal?: AbortSignal
): Promise<void> {
  if (operations.length === 0) return;
  signal?.throwIfAborted();
  const limit = Math.max(1, concurrency);
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", forwardAbort, { once: true });

  let index = 0;
  let failed = false;
  let firstError: unknown;
  const fail = (error: unknown) => {
    if (failed) return;
    failed = true;
    firstError = error;
    controller.abort(error);
  };

  const workers = Array.from({ length: Math.min(limit, operations.length) }, async () => {
    while (!controller.signal.aborted) {
      const current = index;
      index += 1;
      if (current >= operations.length) return;
      try {
        await operations[current](controller.signal);
      } catch (error) {
        fail(error);
      }
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }
  if (signal?.aborted) {
    throw signal.reason;
  }
  if (failed) {
    throw firstError;
  }
}
