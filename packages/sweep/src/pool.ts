/**
 * Bounded worker pool.
 *
 * Up to `concurrency` workers pull the next unclaimed index; each task's
 * value lands in the slot of its own index, so the output order is the input
 * order whatever the completion order. Once `shouldStop` returns true no
 * further index is claimed and unclaimed slots are filled by `onSkipped`.
 * A task that rejects also stops new claims, and the pool rejects with that
 * error.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  options: {
    shouldStop?: () => boolean;
    onSkipped?: (item: T, index: number) => R;
  } = {}
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  const claimed = new Array<boolean>(items.length).fill(false);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (next < items.length && !failed && !options.shouldStop?.()) {
      const index = next++;
      claimed[index] = true;
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, worker);
  await Promise.all(workers);

  for (let i = 0; i < items.length; i++) {
    if (claimed[i]) continue;
    if (!options.onSkipped) {
      throw new Error(`pool stopped before item ${i} and no onSkipped handler was given`);
    }
    results[i] = options.onSkipped(items[i], i);
  }
  return results;
}
