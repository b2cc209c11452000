export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results are returned in input order regardless of completion order; a
 * rejected call is reported in its slot and never stops the others.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results: Settled<R>[] = new Array(items.length);
  const pending = new Set<Promise<void>>();

  for (let index = 0; index < items.length; index += 1) {
    const item = items[index];
    const promise = (async () => {
      try {
        results[index] = { ok: true, value: await worker(item, index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    })();
    pending.add(promise);
    void promise.then(() => pending.delete(promise));
    if (pending.size >= limit) {
      await Promise.race(pending);
    }
  }

  await Promise.all(pending);
  return results;
}
