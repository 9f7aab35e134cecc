import { describe, it, expect, beforeEach } from 'vitest';

import {
  FakeBotClient,
  createTestLogger,
  messageEvent,
} from '../../src/__tests__/helpers/fake-chat.js';
import EchoBot from '../echo-bot/index.js';

describe('EchoBot', () => {
  let client: FakeBotClient;
  let bot: EchoBot;

  beforeEach(async () => {
    client = new FakeBotClient();
    client.users.set(7, { user_id: 7, email: 'ada@example.test', role: 400 });
    bot = new EchoBot({ name: 'echo', client, logger: createTestLogger() });
    await bot.postInit();
  });

  it('repeats the words after !echo', async () => {
    await bot.onEvent(messageEvent(1, { content: '!echo hello   world' }));
    expect(client.replies).toEqual(['hello world']);
  });

  it('stays quiet for an empty !echo', async () => {
    await bot.onEvent(messageEvent(1, { content: '!echo' }));
    expect(client.sent).toEqual([]);
  });

  it('echoes plain messages with a prefix', async () => {
    await bot.onEvent(messageEvent(1, { content: 'good morning' }));
    expect(client.sent).toEqual([
      { type: 'stream', to: 3, topic: 'general', content: 'Echo: good morning' },
    ]);
  });

  it('answers when mentioned', async () => {
    await bot.onEvent(messageEvent(1, { content: '@**Relay Bot** echo hi' }));
    expect(client.replies).toEqual(['hi']);
  });
});
