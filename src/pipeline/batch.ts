import pLimit from "p-limit";
import { chunk } from "../utils/collections.js";

/**
 * Runs `work` over fixed-size batches. `concurrency` caps how many batches
 * are in flight at once; it only overlaps work that awaits, a synchronous
 * worker runs its batches one after another. Results land at their input
 * positions, so the output order never depends on which batch finishes first.
 */
export async function mapInBatches<T, R>(input: {
  items: readonly T[];
  batchSize: number;
  concurrency: number;
  work: (batch: T[], offset: number) => R[] | Promise<R[]>;
  onBatchCompleted?: (done: number, total: number) => void;
}): Promise<R[]> {
  if (input.items.length === 0) {
    return [];
  }

  const batchSize = Math.max(1, Math.floor(input.batchSize));
  const groups = chunk(input.items, batchSize);
  const limiter = pLimit(Math.max(1, Math.floor(input.concurrency)));
  const output = new Array<R>(input.items.length);
  let done = 0;

  await Promise.all(
    groups.map((group, groupIndex) =>
      limiter(async () => {
        const offset = groupIndex * batchSize;
        const results = await input.work(group, offset);
        if (results.length !== group.length) {
          throw new Error(
            `Batch worker returned ${results.length} results for ${group.length} items.`,
          );
        }
        results.forEach((result, index) => {
          output[offset + index] = result;
        });
        done += 1;
        input.onBatchCompleted?.(done, groups.length);
      }),
    ),
  );

  return output;
}
