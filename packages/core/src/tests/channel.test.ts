import { describe, it, expect, vi } from 'vitest';
import { InMemoryCommandChannel, destinations } from '../channel.js';
import { createDispatchInvoker, createInlineInvoker } from '../invoker.js';
import type { CommandMessage } from '../types.js';

describe('destinations', () => {
  it('names reply and event destinations after the saga id', () => {
    expect(destinations.actionResult('s1')).toBe('saga.s1.action_result');
    expect(destinations.compensationResult('s1')).toBe('saga.s1.compensation_result');
    expect(destinations.completed('s1')).toBe('saga_events.s1.completed');
    expect(destinations.failed('s1')).toBe('saga_events.s1.failed');
  });
});

describe('InMemoryCommandChannel', () => {
  it('records every publish and returns sequential ids', async () => {
    const channel = new InMemoryCommandChannel();
    expect(await channel.publish('a', { n: 1 })).toBe('msg-1');
    expect(await channel.publish('b', { n: 2 }, { phase: 'action' })).toBe('msg-2');
    expect(channel.published).toEqual([
      { id: 'msg-1', destination: 'a', message: { n: 1 }, headers: {} },
      { id: 'msg-2', destination: 'b', message: { n: 2 }, headers: { phase: 'action' } },
    ]);
    expect(channel.messagesFor('b')).toEqual([{ n: 2 }]);
  });

  it('delivers to subscribers of the destination only', async () => {
    const channel = new InMemoryCommandChannel();
    const onA = vi.fn();
    const onB = vi.fn();
    await channel.subscribe('a', onA);
    await channel.subscribe('b', onB);

    await channel.publish('a', 'hello', { k: 'v' });

    expect(onA).toHaveBeenCalledWith('hello', { k: 'v' });
    expect(onB).not.toHaveBeenCalled();
  });

  it('stops delivering after unsubscribe', async () => {
    const channel = new InMemoryCommandChannel();
    const handler = vi.fn();
    const id = await channel.subscribe('a', handler);
    await channel.unsubscribe(id);
    await channel.unsubscribe('unknown');
    await channel.publish('a', 1);
    expect(handler).not.toHaveBeenCalled();
    expect(channel.subscribedDestinations()).toEqual([]);
  });

  it('drain() waits for handlers started by other handlers', async () => {
    const channel = new InMemoryCommandChannel();
    const seen: string[] = [];
    await channel.subscribe('first', async () => {
      await Promise.resolve();
      await channel.publish('second', null);
    });
    await channel.subscribe('second', async () => {
      await Promise.resolve();
      seen.push('second');
    });

    await channel.publish('first', null);
    await channel.drain();

    expect(seen).toEqual(['second']);
  });

  it('drain() rethrows handler failures once', async () => {
    const channel = new InMemoryCommandChannel();
    await channel.subscribe('a', async () => {
      throw new Error('handler blew up');
    });
    await channel.publish('a', null);

    await expect(channel.drain()).rejects.toThrow('1 message handler(s) failed');
    await expect(channel.drain()).resolves.toBeUndefined();
  });
});

describe('step invokers', () => {
  const command: CommandMessage = {
    saga_id: 's1',
    step_index: 2,
    step_name: 'ship_order',
    payload: {},
    reply_destination: 'saga.s1.action_result',
    correlation_id: null,
  };

  it('the dispatch invoker publishes the command with de-duplication headers', async () => {
    const channel = new InMemoryCommandChannel();
    const invoker = createDispatchInvoker(channel);

    expect(invoker.kind).toBe('dispatch');
    expect(await invoker.dispatch('compensation', 'shipping.cancel', command)).toBe('msg-1');
    expect(channel.published[0]).toEqual({
      id: 'msg-1',
      destination: 'shipping.cancel',
      message: command,
      headers: { 'saga-id': 's1', 'step-index': '2', phase: 'compensation' },
    });
  });

  it('the inline invoker reports success and failure as outcomes', async () => {
    const invoker = createInlineInvoker();
    const boom = new Error('boom');
    const step = {
      name: 'a',
      execute: async () => 7,
      compensate: async () => {
        throw boom;
      },
    };

    expect(invoker.kind).toBe('inline');
    expect(await invoker.execute(step, { results: {} })).toEqual({ ok: true, value: 7 });
    expect(await invoker.compensate(step, { results: {} }, 7)).toEqual({ ok: false, error: boom });
  });
});
