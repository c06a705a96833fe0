import type { ConversationEvent } from '../types/index.js';

export type ConversationEventEmitter = {
  readonly emit: (event: ConversationEvent) => void;
  readonly complete: () => void;
  readonly error: (err: Error) => void;
  readonly iterator: () => AsyncIterable<ConversationEvent>;
};

/**
 * Buffered event stream with a single consumer. Events emitted before the
 * consumer starts are kept and delivered in order.
 */
export function createConversationEventEmitter(): ConversationEventEmitter {
  const buffer: Array<ConversationEvent> = [];
  let waiter: ((result: IteratorResult<ConversationEvent> | Error) => void) | null = null;
  let done = false;
  let pendingError: Error | null = null;

  const asyncIterator: AsyncIterator<ConversationEvent> = {
    next: async (): Promise<IteratorResult<ConversationEvent>> => {
      const buffered = buffer.shift();
      if (buffered !== undefined) {
        return { value: buffered, done: false };
      }

      if (pendingError) {
        const err = pendingError;
        pendingError = null;
        throw err;
      }

      if (done) {
        return { done: true, value: undefined };
      }

      return new Promise<IteratorResult<ConversationEvent>>((resolve, reject) => {
        waiter = (result) => {
          if (result instanceof Error) {
            reject(result);
          } else {
            resolve(result);
          }
        };
      });
    },
  };

  function takeWaiter(): ((result: IteratorResult<ConversationEvent> | Error) => void) | null {
    const w = waiter;
    waiter = null;
    return w;
  }

  return {
    emit: (event: ConversationEvent) => {
      if (done) {
        return;
      }
      const w = takeWaiter();
      if (w) {
        w({ value: event, done: false });
      } else {
        buffer.push(event);
      }
    },

    complete: () => {
      done = true;
      takeWaiter()?.({ done: true, value: undefined });
    },

    error: (err: Error) => {
      const w = takeWaiter();
      if (w) {
        w(err);
      } else {
        pendingError = err;
      }
    },

    iterator: () => ({
      [Symbol.asyncIterator]: () => asyncIterator,
    }),
  };
}
