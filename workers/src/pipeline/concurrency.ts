/**
 * Small async helpers shared by the page and chunk stages.
 */

import { RunAbortedError, TimeoutError } from "../errors.js";

/**
 * Map over items with at most `limit` calls in flight.
 * Results keep the input order whatever order the calls settle in.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) {
        throw new RunAbortedError(signal.reason);
      }
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    () => worker(),
  );
  await Promise.all(workers);
  return results;
}

/**
 * Run `run` with its own abort signal, aborted after `ms` with a
 * TimeoutError or as soon as `parent` aborts (with the parent's reason).
 * Rejects with that reason even if `run` ignores its signal.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parent: AbortSignal | undefined,
  label: string,
): Promise<T> {
  const controller = new AbortController();

  if (parent?.aborted) {
    throw new RunAbortedError(parent.reason);
  }

  const onParentAbort = () =>
    controller.abort(new RunAbortedError(parent?.reason));
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer = setTimeout(
    () => controller.abort(new TimeoutError(label, ms)),
    ms,
  );

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(controller.signal.reason),
      { once: true },
    );
  });

  try {
    return await Promise.race([run(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
