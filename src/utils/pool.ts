// =============================================================================
// Worker Pool: Parallelism Control
// =============================================================================

/** Options for pooled processing. */
export type PoolOptions<T, R> = {
  /** Number of concurrent operations (default: 10). */
  concurrency?: number;
  /** Called as each item completes, in completion order. */
  onResult?: (result: R, item: T, index: number) => void;
};

/**
 * Process items one at a time with a fixed-size pool of workers.
 *
 * Resolves with one result per item, indexed like `items`, whatever order the
 * processors finish in. A processor that throws rejects the whole pool, so
 * per-item failures should be turned into results by the processor itself.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  options: PoolOptions<T, R> = {},
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 10));
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      const item = items[idx];
      const result = await processor(item, idx);
      results[idx] = result;
      options.onResult?.(result, item, idx);
    }
  });

  await Promise.all(workers);
  return results;
}
