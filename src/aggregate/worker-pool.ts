/**
 * Run `fn` over `items` with at most `concurrency` calls in flight. Workers
 * share one iterator, so an async generator source is consumed lazily and
 * in order. The first rejection stops the remaining workers from pulling
 * new items and is rethrown once in-flight calls settle.
 */
export async function work<T>(
  concurrency: number,
  items: AsyncIterable<T> | Iterable<T>,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new RangeError(
      `concurrency must be a positive integer, got ${concurrency}`,
    );
  }

  const iterator = toAsyncIterator(items);
  let failed = false;

  const worker = async (): Promise<void> => {
    try {
      while (!failed) {
        const next = await iterator.next();
        if (next.done) {
          return;
        }
        await fn(next.value);
      }
    } catch (error) {
      failed = true;
      throw error;
    }
  };

  const results = await Promise.allSettled(
    Array.from({ length: concurrency }, worker),
  );
  const rejection = results.find(
    (result): result is PromiseRejectedResult => result.status === "rejected",
  );
  if (rejection) {
    await iterator.return?.();
    throw rejection.reason;
  }
}

function toAsyncIterator<T>(
  items: AsyncIterable<T> | Iterable<T>,
): AsyncIterator<T> {
  if (isAsyncIterable(items)) {
    return items[Symbol.asyncIterator]();
  }
  const sync = items[Symbol.iterator]();
  return {
    next: async () => sync.next(),
  };
}

function isAsyncIterable<T>(
  items: AsyncIterable<T> | Iterable<T>,
): items is AsyncIterable<T> {
  return Symbol.asyncIterator in items;
}
