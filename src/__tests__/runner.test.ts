import { describe, it, expect, vi } from 'vitest';
import type { Message } from '@relaybot/chat-client';
import { NetworkFatalError, type CachePolicy } from '@relaybot/core';
import { EventBus } from '@relaybot/event-bus';

import { BaseBot, type BaseBotOptions } from '../bot.js';
import { BotStorage } from '../bot-storage.js';
import { CacheLayer } from '../cache-layer.js';
import { argument, stringArg } from '../command-types.js';
import { MemoryKeyValueStore } from '../db/kv-store.js';
import { BotRunner, runAllBots } from '../runner.js';
import {
  FakeBotClient,
  TEST_RETRY,
  createTestLogger,
  messageEvent,
} from './helpers/fake-chat.js';

const CACHE: CachePolicy = { flushIntervalMs: 60000, retryDelayMs: 10, maxRetries: 3 };

class MemoBot extends BaseBot {
  protected registerCommands(): void {
    this.registry.register({
      name: 'remember',
      args: [argument('value')],
      handler: (invocation) => {
        this.storage?.put('last', stringArg(invocation, 'value') ?? '');
        return 'noted';
      },
    });
  }

  async onMessage(_message: Message): Promise<void> {}
}

function setup(name = 'memo-bot', overrides: Partial<BaseBotOptions> = {}) {
  const client = new FakeBotClient();
  const store = new MemoryKeyValueStore();
  const bus = new EventBus();
  const logger = createTestLogger();
  const cache = new CacheLayer({ store, logger });
  const bot = new MemoBot({
    name,
    client,
    logger,
    bus,
    storage: new BotStorage(cache, name),
    ...overrides,
  });
  const onStart = vi.spyOn(bot, 'onStart');
  const onStop = vi.spyOn(bot, 'onStop');
  const runner = new BotRunner({
    bot,
    retry: TEST_RETRY,
    cache: CACHE,
    bus,
    sleep: async () => {},
  });
  return { client, store, bus, logger, bot, runner, onStart, onStop };
}

describe('BotRunner', () => {
  it('starts, handles events and flushes on stop', async () => {
    const { client, store, bus, runner, onStart, onStop } = setup();
    const controller = new AbortController();
    client.queuePoll([messageEvent(1, { content: '!remember blue' })]);
    client.onIdle = () => controller.abort();

    await runner.run(controller.signal);

    expect(client.replies).toEqual(['noted']);
    expect(client.presence).toEqual(['active']);
    expect(client.deleted).toEqual(['q-1']);
    await expect(store.get('memo-bot', 'last')).resolves.toBe('"blue"');
    expect(onStart).toHaveBeenCalledTimes(1);
    expect(onStop).toHaveBeenCalledTimes(1);

    const names = bus.getBuffer().map((record) => record.event);
    expect(names.slice(0, 2)).toEqual(['bot:started', 'queue:registered']);
    expect(names.slice(-2)).toEqual(['queue:closed', 'bot:stopped']);
    expect(bus.getBuffer('bot:started').map((r) => r.payload)).toEqual([
      { bot: 'memo-bot', userId: 1 },
    ]);
  });

  it('passes event types and narrow to the queue registration', async () => {
    const client = new FakeBotClient();
    const bot = new MemoBot({ name: 'memo-bot', client, logger: createTestLogger() });
    const runner = new BotRunner({
      bot,
      retry: TEST_RETRY,
      cache: CACHE,
      eventTypes: ['message', 'reaction'],
      narrow: [['stream', 'ops']],
    });
    const controller = new AbortController();
    client.onIdle = () => controller.abort();

    await runner.run(controller.signal);

    expect(client.registrations).toEqual([
      { eventTypes: ['message', 'reaction'], narrow: [['stream', 'ops']] },
    ]);
  });

  it('stops once however often it is asked', async () => {
    const { runner, onStop } = setup();
    await runner.start();
    await Promise.all([runner.stop(), runner.stop()]);
    await runner.stop();
    expect(onStop).toHaveBeenCalledTimes(1);
  });

  it('logs a failing onStop hook and still reports the stop', async () => {
    const { runner, bus, logger, onStop } = setup();
    onStop.mockRejectedValueOnce(new Error('cleanup failed'));
    await runner.start();
    await runner.stop();

    expect(logger.error).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: 'cleanup failed' }) },
      'onStop hook failed',
    );
    expect(bus.getBuffer('bot:stopped')).toHaveLength(1);
  });

  it('rethrows a fatal error after stopping', async () => {
    const { client, runner, onStop } = setup();
    client.queuePoll(new NetworkFatalError('GET /events rejected credentials (HTTP 401)'));

    await expect(runner.run()).rejects.toThrow('GET /events rejected credentials (HTTP 401)');
    expect(onStop).toHaveBeenCalledTimes(1);
    expect(client.deleted).toEqual([]);
  });
});

describe('runAllBots', () => {
  it('stops every bot when the signal aborts', async () => {
    const a = setup('bot-a');
    const b = setup('bot-b');
    const controller = new AbortController();
    let idle = 0;
    const onIdle = () => {
      idle++;
      if (idle === 2) controller.abort();
    };
    a.client.onIdle = onIdle;
    b.client.onIdle = onIdle;

    await runAllBots([a.runner, b.runner], controller.signal);

    expect(a.client.deleted).toEqual(['q-1']);
    expect(b.client.deleted).toEqual(['q-1']);
    expect(a.onStop).toHaveBeenCalledTimes(1);
    expect(b.onStop).toHaveBeenCalledTimes(1);
  });

  it('stops the others when one bot fails and rethrows its error', async () => {
    const a = setup('bot-a');
    const b = setup('bot-b');
    a.client.queuePoll(new NetworkFatalError('bad credentials'));

    await expect(runAllBots([a.runner, b.runner], new AbortController().signal)).rejects.toThrow(
      'bad credentials',
    );
    expect(b.onStop).toHaveBeenCalledTimes(1);
    expect(a.logger.error).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: 'bad credentials' }) },
      'Bot failed; stopping all bots',
    );
  });
});
