export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Run `iterator` over `items` with at most `limit` calls in flight. A rejected
 * call is recorded and the remaining items still run; results keep input order.
 */
export async function asyncPool<T, R>(
  limit: number,
  items: readonly T[],
  iterator: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const settled: Settled<R>[] = [];
  const queue = items.map((item, index) => ({ item, index }));

  const drain = async (): Promise<void> => {
    for (let job = queue.shift(); job !== undefined; job = queue.shift()) {
      try {
        settled[job.index] = { ok: true, value: await iterator(job.item, job.index) };
      } catch (error) {
        settled[job.index] = { ok: false, error };
      }
    }
  };

  const width = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: width }, drain));
  return settled;
}

/** Values of a fully successful run; otherwise the first failure in input order. */
export function unwrapSettled<R>(results: readonly Settled<R>[]): R[] {
  const values: R[] = [];
  for (const r of results) {
    if (!r.ok) throw r.error;
    values.push(r.value);
  }
  return values;
}
