import { describe, it, expect } from 'vitest';
import { createConversationEventEmitter } from './events.js';
import type { ConversationEvent } from '../types/index.js';

async function collect(iterable: AsyncIterable<ConversationEvent>): Promise<Array<ConversationEvent>> {
  const events: Array<ConversationEvent> = [];
  for await (const event of iterable) {
    events.push(event);
  }
  return events;
}

describe('createConversationEventEmitter', () => {
  it('delivers events buffered before the consumer starts', async () => {
    const emitter = createConversationEventEmitter();
    emitter.emit({ kind: 'TOOL_CALLS_DISCARDED', iteration: 1, count: 2 });
    emitter.emit({ kind: 'TURN_LIMIT', reason: 'max_iterations', iteration: 10 });
    emitter.complete();

    expect(await collect(emitter.iterator())).toEqual([
      { kind: 'TOOL_CALLS_DISCARDED', iteration: 1, count: 2 },
      { kind: 'TURN_LIMIT', reason: 'max_iterations', iteration: 10 },
    ]);
  });

  it('wakes a waiting consumer', async () => {
    const emitter = createConversationEventEmitter();
    const collected = collect(emitter.iterator());

    await Promise.resolve();
    emitter.emit({ kind: 'TURN_LIMIT', reason: 'rate_limit', iteration: 3 });
    await Promise.resolve();
    emitter.complete();

    expect(await collected).toEqual([{ kind: 'TURN_LIMIT', reason: 'rate_limit', iteration: 3 }]);
  });

  it('ignores events after completion', async () => {
    const emitter = createConversationEventEmitter();
    emitter.complete();
    emitter.emit({ kind: 'TURN_LIMIT', reason: 'rate_limit', iteration: 3 });

    expect(await collect(emitter.iterator())).toEqual([]);
  });

  it('surfaces an error to the consumer', async () => {
    const emitter = createConversationEventEmitter();
    emitter.error(new Error('stream broke'));

    await expect(collect(emitter.iterator())).rejects.toThrow('stream broke');
  });
});
