// Fixed fan-out worker pool.
// Workers pull the next index from a shared cursor; once the signal aborts no new item starts,
// while items already running are awaited.

export type PoolResult<R> = {
  results: Array<R | undefined>;
  started: number;
  stopped: boolean;
};

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  opts: { signal?: AbortSignal } = {},
): Promise<PoolResult<R>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const workerCount = Math.max(0, Math.min(Math.max(1, limit), items.length));
  let cursor = 0;
  let started = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (cursor < items.length) {
      if (opts.signal?.aborted) return;

      const index = cursor;
      cursor += 1;
      started += 1;
      results[index] = await fn(items[index], index);
    }
  });

  await Promise.all(workers);

  return { results, started, stopped: started < items.length };
}
