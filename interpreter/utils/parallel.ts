export interface ParallelOptions {
  /** Once aborted, no further items are started; running ones finish */
  signal?: AbortSignal;
}

/**
 * Run async tasks with a concurrency cap.
 *
 * Results are placed at the index of their item. Items never started
 * because the signal was aborted are left `undefined`.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  run: (item: T, index: number) => Promise<R>,
  opts: ParallelOptions = {}
): Promise<Array<R | undefined>> {
  const count = items.length;
  const results: Array<R | undefined> = new Array<R | undefined>(count).fill(undefined);
  if (count === 0) return results;
  const cap = Math.max(1, Math.min(limit || 1, count));
  let index = 0;

  const nextIndex = (): number => {
    if (index >= count || opts.signal?.aborted) return -1;
    return index++;
  };

  const worker = async () => {
    while (true) {
      const i = nextIndex();
      if (i < 0) break;
      results[i] = await run(items[i], i);
    }
  };

  await Promise.all(Array.from({ length: cap }, () => worker()));
  return results;
}
