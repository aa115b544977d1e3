/**
 * Run `worker` over `items` with at most `width` in flight. Results keep the
 * input order. A worker that throws rejects the whole call, so workers are
 * expected to turn their own failures into values.
 */
export async function runPool<T, R>(items: readonly T[], width: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`Pool width must be a positive integer, got ${width}`);
  }
  const results = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < Math.min(width, items.length); i += 1) {
    lanes.push(lane());
  }
  await Promise.all(lanes);
  return results;
}
