import os from "node:os";

export function defaultConcurrency(): number {
  return Math.max(1, os.cpus()?.length ?? 1);
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 *
 * A fixed set of workers pulls the next index from a shared cursor, so
 * dispatch order is list order but completion order is arbitrary; callers
 * that care about order write into `results[index]`. The first rejection
 * stops every worker from taking new items and rejects the whole run once
 * in-flight calls have settled.
 */
export async function parallelMapLimit<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  if (items.length === 0) return results;
  const k = Math.max(1, Math.min(concurrency, items.length));
  let i = 0;
  let stopped = false;
  const workers = Array.from({ length: k }, async () => {
    while (!stopped) {
      const idx = i++;
      if (idx >= items.length) break;
      try {
        results[idx] = await fn(items[idx], idx);
      } catch (err) {
        stopped = true;
        throw err;
      }
    }
  });
  const settled = await Promise.allSettled(workers);
  for (const s of settled) {
    if (s.status === "rejected") throw s.reason;
  }
  return results;
}
