import { describe, it, expect, vi } from 'vitest';
import type { ChatEvent } from '@relaybot/chat-client';
import {
  NetworkFatalError,
  NetworkTransientError,
  QueueExpiredError,
} from '@relaybot/core';
import { EventBus } from '@relaybot/event-bus';

import { EventSource } from '../event-source.js';
import {
  FakeQueueApi,
  TEST_RETRY,
  createTestLogger,
  heartbeat,
  messageEvent,
} from './helpers/fake-chat.js';

function setup(api: FakeQueueApi, retry = TEST_RETRY) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const logger = createTestLogger();
  const bus = new EventBus();
  const source = new EventSource({ api, retry, bot: 'test-bot', bus, logger, sleep });
  const controller = new AbortController();
  api.onIdle = () => controller.abort();
  const seen: number[] = [];
  const handler = (event: ChatEvent) => {
    seen.push(event.id);
  };
  return { source, sleep, logger, bus, controller, seen, handler };
}

describe('EventSource', () => {
  it('delivers events in order and polls from the highest id seen', async () => {
    const api = new FakeQueueApi().queuePoll(
      [messageEvent(0), heartbeat(1), messageEvent(2)],
      [messageEvent(3)],
    );
    const { source, controller, seen, handler } = setup(api);

    await source.run(handler, ['message'], [['stream', 'general']], controller.signal);

    expect(seen).toEqual([0, 2, 3]);
    expect(api.registrations).toEqual([{ eventTypes: ['message'], narrow: [['stream', 'general']] }]);
    expect(api.polls.map((p) => p.lastEventId)).toEqual([-1, 2, 3]);
    expect(source.state).toBe('closed');
    expect(api.deleted).toEqual(['q-1']);
  });

  it('never moves lastEventId backwards', async () => {
    const api = new FakeQueueApi().queuePoll([messageEvent(5), messageEvent(4)], [messageEvent(1)]);
    const { source, controller, seen, handler } = setup(api);

    await source.run(handler, ['message'], [], controller.signal);

    expect(seen).toEqual([5, 4, 1]);
    expect(api.polls.map((p) => p.lastEventId)).toEqual([-1, 5, 5]);
  });

  it('advances past heartbeats without handing them to the handler', async () => {
    const api = new FakeQueueApi().queuePoll([heartbeat(7)]);
    const { source, controller, seen, handler } = setup(api);

    await source.run(handler, ['message'], [], controller.signal);

    expect(seen).toEqual([]);
    expect(api.polls.map((p) => p.lastEventId)).toEqual([-1, 7]);
  });

  it('re-registers exactly once when the queue expires and logs the gap', async () => {
    const api = new FakeQueueApi()
      .queueRegistration({ queueId: 'q-1', lastEventId: -1 })
      .queueRegistration({ queueId: 'q-2', lastEventId: 9 })
      .queuePoll([messageEvent(0)], new QueueExpiredError('q-1'), [messageEvent(10)]);
    const { source, controller, seen, handler, logger, bus } = setup(api);

    await source.run(handler, ['message'], [], controller.signal);

    expect(seen).toEqual([0, 10]);
    expect(api.registrations).toHaveLength(2);
    expect(api.polls).toEqual([
      { queueId: 'q-1', lastEventId: -1 },
      { queueId: 'q-1', lastEventId: 0 },
      { queueId: 'q-2', lastEventId: 9 },
      { queueId: 'q-2', lastEventId: 10 },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      { expiredQueueId: 'q-1', lastDeliveredId: 0, newQueueId: 'q-2', resumeFromId: 9 },
      'Event queue expired; events between the last delivered id and the new queue may be lost',
    );
    expect(bus.getBuffer('queue:expired').map((r) => r.payload)).toEqual([
      { bot: 'test-bot', queueId: 'q-1', lastDeliveredId: 0 },
    ]);
    expect(api.deleted).toEqual(['q-2']);
  });

  it('retries transient poll failures with backoff', async () => {
    const api = new FakeQueueApi().queuePoll(
      new NetworkTransientError('connection reset'),
      new NetworkTransientError('rate limited', { retryAfterMs: 5000 }),
      [messageEvent(0)],
    );
    const { source, controller, seen, handler, sleep, bus } = setup(api);

    await source.run(handler, ['message'], [], controller.signal);

    expect(seen).toEqual([0]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 5000]);
    expect(bus.getBuffer('poll:retry')).toHaveLength(2);
  });

  it('stops with NetworkFatalError when retries are exhausted', async () => {
    const api = new FakeQueueApi().queuePoll(
      new NetworkTransientError('boom'),
      new NetworkTransientError('boom'),
      new NetworkTransientError('boom'),
    );
    const { source, controller, handler, bus } = setup(api);

    const err = await source.run(handler, ['message'], [], controller.signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkFatalError);
    expect(err).toMatchObject({ message: 'poll failed after 3 attempts: boom' });
    expect(source.state).toBe('closed');
    expect(api.polls).toHaveLength(3);
    expect(api.deleted).toEqual([]);
    expect(bus.getBuffer('queue:closed').map((r) => r.payload)).toEqual([
      { bot: 'test-bot', reason: 'fatal' },
    ]);
  });

  it('fails on the first transient error when retries are disabled', async () => {
    const api = new FakeQueueApi().queuePoll(new NetworkTransientError('timed out'));
    const { source, controller, handler, sleep } = setup(api, { ...TEST_RETRY, enabled: false });

    await expect(source.run(handler, ['message'], [], controller.signal)).rejects.toBeInstanceOf(
      NetworkTransientError,
    );
    expect(sleep).not.toHaveBeenCalled();
  });

  it('surfaces a fatal registration error', async () => {
    const api = new FakeQueueApi().queueRegistration(new NetworkFatalError('rejected credentials'));
    const { source, controller, handler } = setup(api);

    await expect(source.run(handler, ['message'], [], controller.signal)).rejects.toBeInstanceOf(
      NetworkFatalError,
    );
    expect(api.polls).toEqual([]);
    expect(source.state).toBe('closed');
  });

  it('keeps going when a handler throws', async () => {
    const api = new FakeQueueApi().queuePoll([messageEvent(0), messageEvent(1), messageEvent(2)]);
    const { source, controller, bus, logger } = setup(api);
    const seen: number[] = [];

    await source.run(
      (event) => {
        seen.push(event.id);
        if (event.id === 1) throw new Error('bad event');
      },
      ['message'],
      [],
      controller.signal,
    );

    expect(seen).toEqual([0, 1, 2]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(bus.getBuffer('event:handler-failed').map((r) => r.payload)).toEqual([
      { bot: 'test-bot', eventId: 1, eventType: 'message', error: 'bad event' },
    ]);
  });

  it('checks for cancellation between handler calls', async () => {
    const api = new FakeQueueApi().queuePoll([messageEvent(0), messageEvent(1)]);
    const { source, controller } = setup(api);
    const seen: number[] = [];

    await source.run(
      (event) => {
        seen.push(event.id);
        controller.abort();
      },
      ['message'],
      [],
      controller.signal,
    );

    expect(seen).toEqual([0]);
    expect(api.polls).toHaveLength(1);
    expect(api.deleted).toEqual(['q-1']);
  });

  it('returns at once when already cancelled', async () => {
    const api = new FakeQueueApi();
    const { source, handler } = setup(api);
    const controller = new AbortController();
    controller.abort();

    await source.run(handler, ['message'], [], controller.signal);

    expect(api.registrations).toEqual([]);
    expect(source.state).toBe('closed');
  });

  it('cannot be restarted once closed', async () => {
    const api = new FakeQueueApi();
    const { source, controller, handler } = setup(api);
    await source.run(handler, ['message'], [], controller.signal);

    await expect(source.run(handler, ['message'], [], new AbortController().signal)).rejects.toThrow(
      'EventSource is closed',
    );
  });

  it('moves through registered and polling before closing', async () => {
    const api = new FakeQueueApi().queuePoll([messageEvent(0)]);
    const { source, controller } = setup(api);
    const states: string[] = [];

    await source.run(
      () => {
        states.push(source.state);
      },
      ['message'],
      [],
      controller.signal,
    );

    expect(states).toEqual(['polling']);
    expect(source.state).toBe('closed');
    expect(source.queue).toBeNull();
  });
});
