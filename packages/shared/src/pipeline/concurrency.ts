/**
 * Bounded-concurrency map over a shared work queue. Results keep the input
 * order; items never started because the signal was aborted are left
 * undefined.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const queue = items.map((item, index) => ({ item, index }));
  const workerCount = Math.max(1, Math.min(concurrency, queue.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0) {
      if (signal?.aborted) return;
      const next = queue.shift();
      if (!next) continue;
      results[next.index] = await fn(next.item, next.index);
    }
  });

  await Promise.all(workers);
  return results;
}

/**
 * Reject with `onTimeout()` when `promise` does not settle within `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
