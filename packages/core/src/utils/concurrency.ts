// packages/core/src/utils/concurrency.ts - Bounded async fan-out

import { availableParallelism } from 'node:os';

/** Resolve a configured concurrency (0 or less means "use all cores"). */
export function resolveConcurrency(configured: number): number {
  if (configured > 0) return Math.floor(configured);
  return Math.max(1, availableParallelism());
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
