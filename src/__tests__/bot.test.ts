import { describe, it, expect, beforeEach } from 'vitest';
import type { Message } from '@relaybot/chat-client';
import { EventBus } from '@relaybot/event-bus';

import { BaseBot, type BaseBotOptions } from '../bot.js';
import { argument, numberArg } from '../command-types.js';
import { setLanguage } from '../i18n/index.js';
import {
  FakeBotClient,
  createTestLogger,
  heartbeat,
  messageEvent,
  streamMessage,
  type TestLogger,
} from './helpers/fake-chat.js';

class TestBot extends BaseBot {
  readonly plain: Message[] = [];

  protected registerCommands(): void {
    this.registry.register({
      name: 'ping',
      description: 'Reply with pong',
      handler: () => 'pong',
    });
    this.registry.register({
      name: 'ban',
      description: 'Ban a user',
      minLevel: 50,
      args: [argument('user')],
      handler: () => 'banned',
    });
    this.registry.register({
      name: 'add',
      description: 'Add two numbers',
      args: [argument('a', 'int'), argument('b', 'int')],
      handler: (invocation) => String((numberArg(invocation, 'a') ?? 0) + (numberArg(invocation, 'b') ?? 0)),
    });
    this.registry.register({
      name: 'boom',
      showInHelp: false,
      handler: () => {
        throw new Error('kaput');
      },
    });
  }

  async onMessage(message: Message): Promise<void> {
    this.plain.push(message);
  }
}

describe('BaseBot', () => {
  let client: FakeBotClient;
  let logger: TestLogger;

  function createBot(overrides: Partial<BaseBotOptions> = {}): TestBot {
    return new TestBot({ name: 'test-bot', client, logger, ...overrides });
  }

  beforeEach(() => {
    client = new FakeBotClient();
    logger = createTestLogger();
    client.users.set(7, { user_id: 7, email: 'ada@example.test', role: 400 });
  });

  describe('postInit', () => {
    it('learns its id, sets presence and registers commands once', async () => {
      const bot = createBot();
      expect(bot.userId).toBeNull();

      await bot.postInit();
      await bot.postInit();

      expect(bot.userId).toBe(1);
      expect(client.presence).toEqual(['active', 'active']);
      expect(bot.registry.list().map((spec) => spec.name)).toEqual(['help', 'ping', 'ban', 'add', 'boom']);
      expect(logger.info).toHaveBeenCalledWith({ userId: 1 }, 'Bot profile loaded');
    });

    it('derives mention aliases from the profile', async () => {
      const bot = createBot({ aliases: ['@relay'] });
      await bot.postInit();

      expect(bot.registry.grammar.mentionAliases).toEqual([
        '@relay@example.test',
        '@**Relay Bot**',
        '@Relay Bot',
        '@relay',
      ]);
    });
  });

  describe('onEvent', () => {
    let bot: TestBot;

    beforeEach(async () => {
      bot = createBot();
      await bot.postInit();
    });

    it('replies to a prefixed command on the same stream and topic', async () => {
      await bot.onEvent(messageEvent(1, { content: '!ping', topic: 'lobby' }));
      expect(client.sent).toEqual([{ type: 'stream', to: 3, topic: 'lobby', content: 'pong' }]);
    });

    it('answers when mentioned', async () => {
      await bot.onEvent(messageEvent(1, { content: '@**Relay Bot** ping' }));
      await bot.onEvent(messageEvent(2, { content: '@Relay Bot: add 2 3' }));
      expect(client.replies).toEqual(['pong', '5']);
    });

    it('hands plain messages to onMessage', async () => {
      await bot.onEvent(messageEvent(1, { content: 'just chatting' }));
      expect(bot.plain.map((m) => m.content)).toEqual(['just chatting']);
      expect(client.sent).toEqual([]);
    });

    it('ignores its own messages and non-message events', async () => {
      await bot.onEvent(messageEvent(1, { content: '!ping', sender_id: 1 }));
      await bot.onEvent(heartbeat(2));
      expect(client.sent).toEqual([]);
      expect(bot.plain).toEqual([]);
    });

    it('explains unknown commands and bad arguments', async () => {
      await bot.onEvent(messageEvent(1, { content: '!nope' }));
      await bot.onEvent(messageEvent(2, { content: '!add 1' }));
      await bot.onEvent(messageEvent(3, { content: '!add 1 two' }));
      expect(client.replies).toEqual([
        'Unknown command: nope',
        'Missing argument for add: b',
        'Invalid value for b: two (expected integer)',
      ]);
    });

    it('reports a failing handler without exposing the error', async () => {
      await bot.onEvent(messageEvent(1, { content: '!boom' }));
      expect(client.replies).toEqual(['Something went wrong while running boom.']);
    });

    it('denies a gated command by role and caches the role', async () => {
      await bot.onEvent(messageEvent(1, { content: '!ban bob' }));
      await bot.onEvent(messageEvent(2, { content: '!ban bob' }));
      expect(client.replies).toEqual([
        'You need level 50 to run ban (your level: 10)',
        'You need level 50 to run ban (your level: 10)',
      ]);
      expect(client.getUserCalls).toBe(1);
    });

    it('lets an admin run a gated command', async () => {
      client.users.set(7, { user_id: 7, email: 'ada@example.test', role: 200 });
      await bot.onEvent(messageEvent(1, { content: '!ban bob' }));
      expect(client.replies).toEqual(['banned']);
    });

    it('falls back to level 0 when the role lookup fails, without caching', async () => {
      client.users.clear();
      await bot.onEvent(messageEvent(1, { content: '!ban bob' }));
      await bot.onEvent(messageEvent(2, { content: '!ping' }));

      expect(client.replies).toEqual(['You need level 50 to run ban (your level: 0)', 'pong']);
      expect(client.getUserCalls).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ userId: 7 }),
        'Could not look up sender role',
      );
    });

    it('gives level 0 to a sender without a known role and caches it', async () => {
      client.users.set(7, { user_id: 7, email: 'ada@example.test', role: 999 });
      await bot.onEvent(messageEvent(1, { content: '!ban bob' }));
      client.users.set(7, { user_id: 7, email: 'ada@example.test' });
      await bot.onEvent(messageEvent(2, { content: '!ban bob' }));

      expect(client.replies).toEqual([
        'You need level 50 to run ban (your level: 0)',
        'You need level 50 to run ban (your level: 0)',
      ]);
      expect(client.getUserCalls).toBe(1);
    });

    it('gives level 0 to a sender whose profile has no role', async () => {
      client.users.set(7, { user_id: 7, email: 'ada@example.test' });
      await bot.onEvent(messageEvent(1, { content: '!ban bob' }));
      expect(client.replies).toEqual(['You need level 50 to run ban (your level: 0)']);
    });

    it('only lists commands the caller may run in help', async () => {
      await bot.onEvent(messageEvent(1, { content: '!help' }));
      expect(client.replies).toEqual([
        [
          'Available commands:',
          '/help [command] - Show available commands',
          '/ping - Reply with pong',
          '/add <a> <b> - Add two numbers',
        ].join('\n'),
      ]);
    });
  });

  it('prefers a per-user level over the role', async () => {
    const bot = createBot({ userLevels: { 'ada@example.test': 80 } });
    await bot.postInit();
    await bot.onEvent(messageEvent(1, { content: '!ban bob' }));
    expect(client.replies).toEqual(['banned']);
    expect(client.getUserCalls).toBe(0);
  });

  it('replies in the process language unless one is given', async () => {
    setLanguage('zh-TW');
    try {
      const bot = createBot();
      const english = createBot({ language: 'en' });
      await bot.postInit();
      await english.postInit();
      await bot.onEvent(messageEvent(1, { content: '!nope' }));
      await english.onEvent(messageEvent(2, { content: '!nope' }));
    } finally {
      setLanguage('en');
    }
    expect(client.replies).toEqual(['未知的指令：nope', 'Unknown command: nope']);
  });

  it('uses custom role levels', async () => {
    const bot = createBot({ roleLevels: { member: 60 } });
    await bot.postInit();
    await bot.onEvent(messageEvent(1, { content: '!ban bob' }));
    expect(client.replies).toEqual(['banned']);
  });

  it('reports dispatches on the bus', async () => {
    const bus = new EventBus();
    const bot = createBot({ bus });
    await bot.postInit();
    await bot.onEvent(messageEvent(1, { content: '!ping' }));
    expect(bus.getBuffer('command:dispatched').map((r) => r.payload)).toEqual([
      { bot: 'test-bot', command: 'ping', status: 'handled' },
    ]);
  });

  describe('sendReply', () => {
    it('answers private messages to every participant', async () => {
      const bot = createBot();
      await bot.sendReply(
        streamMessage({
          type: 'private',
          stream_id: null,
          display_recipient: [{ id: 7 }, { id: 1 }],
        }),
        'hi',
      );
      expect(client.sent).toEqual([{ type: 'private', to: [7, 1], content: 'hi' }]);
    });

    it('falls back to the sender for private messages without recipients', async () => {
      const bot = createBot();
      await bot.sendReply(streamMessage({ type: 'private', display_recipient: [] }), 'hi');
      expect(client.sent).toEqual([{ type: 'private', to: [7], content: 'hi' }]);
    });

    it('uses the subject when there is no topic', async () => {
      const bot = createBot();
      await bot.sendReply(streamMessage({ topic: undefined, subject: 'old-style' }), 'hi');
      expect(client.sent).toEqual([{ type: 'stream', to: 3, topic: 'old-style', content: 'hi' }]);
    });

    it('refuses a stream message without a stream id', async () => {
      const bot = createBot();
      await expect(bot.sendReply(streamMessage({ stream_id: null }), 'hi')).rejects.toThrow(
        'Stream message 100 has no stream_id',
      );
    });
  });

  it('translates with its own tables first', () => {
    const bot = createBot({ translations: { en: { 'greet': 'Hello {name}' } } });
    expect(bot.t('greet', { name: 'Ada' })).toBe('Hello Ada');
    expect(bot.t('help.title')).toBe('Available commands:');
  });
});
