import PQueue from "p-queue";

/**
 * Run `task` over `items` on a queue with at most `limit` in flight,
 * yielding results in completion order. When the consumer stops early the
 * items still waiting in the queue are dropped; running ones finish.
 *
 * `task` should not reject; callers convert failures into values. A
 * rejection is rethrown to the consumer.
 */
export async function* runBounded<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): AsyncGenerator<R, void, undefined> {
  if (!Number.isInteger(limit) || limit < 1) throw new RangeError(`concurrency limit must be a positive integer, got ${limit}`);

  const queue = new PQueue({ concurrency: limit });
  const done: R[] = [];
  const state: { failure: { error: unknown } | null; wake: (() => void) | null } = { failure: null, wake: null };

  items.forEach((item, index) => {
    queue
      .add(async () => {
        done.push(await task(item, index));
        state.wake?.();
      })
      .catch((error: unknown) => {
        state.failure ??= { error };
        state.wake?.();
      });
  });

  let yielded = 0;
  try {
    while (yielded < items.length) {
      if (state.failure) throw state.failure.error;
      if (done.length === 0) {
        await new Promise<void>((resolve) => {
          state.wake = resolve;
        });
        state.wake = null;
        continue;
      }
      for (const result of done.splice(0)) {
        yielded++;
        yield result;
      }
    }
  } finally {
    queue.clear();
  }
}
