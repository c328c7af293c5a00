/**
 * Bounded fan-out for provider I/O. At most `limit` calls of `fn` are in flight;
 * results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const max = Math.max(1, Math.floor(limit));
  const results = new Array<R>(items.length);
  let inFlight = 0;
  const queue: Array<() => void> = [];

  async function withSlot(item: T, index: number): Promise<void> {
    if (inFlight >= max) await new Promise<void>((res) => queue.push(res));
    inFlight++;
    try {
      results[index] = await fn(item, index);
    } finally {
      inFlight--;
      const next = queue.shift();
      if (next) next();
    }
  }

  await Promise.all(items.map((item, i) => withSlot(item, i)));
  return results;
}
