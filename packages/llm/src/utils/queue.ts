export type EventQueue<T> = {
  readonly push: (event: T) => void;
  readonly complete: () => void;
  readonly error: (err: Error) => void;
  readonly iterator: () => AsyncIterable<T>;
};

/**
 * Bridges push-style producers to a single async-iterable consumer.
 *
 * `onCancel` runs when the consumer stops iterating before the producer
 * completes (a `break` out of `for await`).
 */
export function createEventQueue<T>(onCancel?: () => void): EventQueue<T> {
  const buffer: T[] = [];
  let waiter: ((result: IteratorResult<T> | Error) => void) | null = null;
  let done = false;
  let pendingError: Error | null = null;

  const settle = (result: IteratorResult<T> | Error): boolean => {
    if (!waiter) {
      return false;
    }
    const w = waiter;
    waiter = null;
    w(result);
    return true;
  };

  const asyncIterator: AsyncIterator<T> = {
    next: async (): Promise<IteratorResult<T>> => {
      const buffered = buffer.shift();
      if (buffered !== undefined) {
        return { value: buffered, done: false };
      }

      if (pendingError) {
        const err = pendingError;
        pendingError = null;
        done = true;
        throw err;
      }

      if (done) {
        return { done: true, value: undefined };
      }

      return new Promise<IteratorResult<T>>((resolve, reject) => {
        waiter = (result) => {
          if (result instanceof Error) {
            reject(result);
          } else {
            resolve(result);
          }
        };
      });
    },

    return: async (): Promise<IteratorResult<T>> => {
      if (!done) {
        done = true;
        buffer.length = 0;
        onCancel?.();
      }
      return { done: true, value: undefined };
    },
  };

  return {
    push: (event: T) => {
      if (done) {
        return;
      }
      if (!settle({ value: event, done: false })) {
        buffer.push(event);
      }
    },

    complete: () => {
      if (done) {
        return;
      }
      done = true;
      settle({ done: true, value: undefined });
    },

    error: (err: Error) => {
      if (done) {
        return;
      }
      if (!settle(err)) {
        pendingError = err;
      } else {
        done = true;
      }
    },

    iterator: () => ({
      [Symbol.asyncIterator]: () => asyncIterator,
    }),
  };
}
