import { availableParallelism } from "os";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function defaultConcurrency(): number {
  return Math.min(32, availableParallelism() + 4);
}

/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 * `onSettled` is called once per item, in completion order, from the
 * coordinating loop; it never runs for two items at the same time.
 */
export async function forEachSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  onSettled: (item: T, result: PromiseSettledResult<R>) => void
): Promise<void> {
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];

      let result: PromiseSettledResult<R>;
      try {
        result = { status: "fulfilled", value: await task(item, index) };
      } catch (reason) {
        result = { status: "rejected", reason };
      }

      onSettled(item, result);
    }
  };

  const poolSize = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: poolSize }, () => worker()));
}
