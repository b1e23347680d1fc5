export type ExclusiveLock = Readonly<{
  run<T>(fn: () => Promise<T> | T): Promise<T>;
}>;

// FIFO mutual exclusion over a promise chain. Readers and writers share the same queue.
export function createExclusiveLock(): ExclusiveLock {
  let tail: Promise<void> = Promise.resolve();

  return {
    run<T>(fn: () => Promise<T> | T): Promise<T> {
      const result = tail.then(() => fn());
      tail = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    }
  };
}
