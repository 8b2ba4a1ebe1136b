/**
 * Promise helpers shared by the fetch and write stages
 */

export class TimeoutError extends Error {
  code = "TIMEOUT" as const;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Reject with a TimeoutError if `promise` has not settled within `timeoutMs`.
 * The underlying operation is not interrupted.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Results keep the order of `items`; a rejected worker rejects the whole call,
 * so workers are expected to capture their own failures.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  async function runLane(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  }

  const lanes = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => runLane()
  );
  await Promise.all(lanes);

  return results;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
