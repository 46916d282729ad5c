import type { Logger } from "./log.js";

export interface ScheduledOperation {
  name: string;
  run: (signal: AbortSignal) => Promise<void>;
}

export interface ScheduleOptions {
  queueSize: number;
  pollIntervalMs: number;
  log?: Logger;
  signal?: AbortSignal;
}

export interface ScheduleSummary {
  total: number;
  finished: number;
}

interface Outcome {
  id: number;
  name: string;
  error?: unknown;
  failed: boolean;
}

/**
 * Run a lazily produced stream of top-level operations with at most
 * `queueSize` of them in flight. The first failure, of an operation or of
 * the source itself, aborts the shared signal, waits for the others to wind
 * down and is rethrown.
 */
export async function schedule(
  source: Iterable<ScheduledOperation> | AsyncIterable<ScheduledOperation>,
  options: ScheduleOptions
): Promise<ScheduleSummary> {
  const iterator = toAsyncIterator(source);
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  const queueSize = Math.max(1, options.queueSize);
  const inFlight = new Map<number, Promise<Outcome>>();
  let hasMore = true;
  let total = 0;
  let finished = 0;

  try {
    while (true) {
      while (hasMore && inFlight.size < queueSize && !controller.signal.aborted) {
        let next: IteratorResult<ScheduledOperation>;
        try {
          next = await iterator.next();
        } catch (error) {
          hasMore = false;
          controller.abort(error);
          await Promise.all(inFlight.values());
          inFlight.clear();
          throw error;
        }
        if (next.done) {
          hasMore = false;
          break;
        }
        const id = total;
        total += 1;
        inFlight.set(id, start(id, next.value, controller.signal));
      }
      if (inFlight.size === 0) break;

      const outcome = await waitForProgress(Array.from(inFlight.values()), options.pollIntervalMs);
      if (!outcome) {
        options.log?.debug(`[schedule] in_flight=${inFlight.size} finished=${finished}/${total}`);
        continue;
      }

      inFlight.delete(outcome.id);
      if (outcome.failed) {
        controller.abort(outcome.error);
        await Promise.all(inFlight.values());
        inFlight.clear();
        throw outcome.error;
      }
      finished += 1;
      options.log?.info(`[schedule] finished ${finished}/${total} (${outcome.name})`);
    }
  } finally {
    options.signal?.removeEventListener("abort", forwardAbort);
    if (hasMore) {
      await iterator.return?.();
    }
  }

  if (controller.signal.aborted) {
    throw controller.signal.reason;
  }
  return { total, finished };
}

function start(id: number, operation: ScheduledOperation, signal: AbortSignal): Promise<Outcome> {
  return Promise.resolve()
    .then(() => operation.run(signal))
    .then(
      (): Outcome => ({ id, name: operation.name, failed: false }),
      (error: unknown): Outcome => ({ id, name: operation.name, error, failed: true })
    );
}

async function waitForProgress(pending: Promise<Outcome>[], pollIntervalMs: number): Promise<Outcome | null> {
  let timer: NodeJS.Timeout | undefined;
  const tick = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), pollIntervalMs);
  });
  try {
    return await Promise.race([...pending, tick]);
  } finally {
    clearTimeout(timer);
  }
}

function toAsyncIterator<T>(source: Iterable<T> | AsyncIterable<T>): AsyncIterator<T> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  const iterator = source[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
    return: async () => iterator.return?.() ?? { done: true, value: undefined }
  };
}

function isAsyncIterable<T>(source: Iterable<T> | AsyncIterable<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}
