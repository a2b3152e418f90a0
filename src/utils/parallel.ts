/**
 * Bounded-concurrency map that never rejects.
 *
 * Each item settles on its own; results come back in input order so callers
 * can keep the fulfilled ones and log the rest.
 */

export type Settled<T, R> =
  | { status: 'fulfilled'; item: T; value: R }
  | { status: 'rejected'; item: T; reason: unknown };

export async function settledMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<Settled<T, R>[]> {
  if (items.length === 0) return [];

  const results = new Array<Settled<T, R>>(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];
      try {
        results[index] = { status: 'fulfilled', item, value: await fn(item, index) };
      } catch (reason) {
        results[index] = { status: 'rejected', item, reason };
      }
    }
  }

  const workers = Array.from(
    { length: Math.min(Math.max(1, concurrency), items.length) },
    worker
  );
  await Promise.all(workers);
  return results;
}

export function fulfilledValues<T, R>(results: Settled<T, R>[]): R[] {
  return results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []));
}
