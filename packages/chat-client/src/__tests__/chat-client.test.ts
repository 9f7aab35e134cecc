import { describe, it, expect } from 'vitest';
import { ChatApiError, NetworkFatalError, QueueExpiredError } from '@relaybot/core';
import { ChatClient, BAD_EVENT_QUEUE_ID } from '../chat-client.js';
import { roleNameFromCode } from '../schemas.js';
import type { Transport, TransportRequest } from '../transport.js';

class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly replies: Array<unknown | Error> = [];

  reply(body: unknown | Error): this {
    this.replies.push(body);
    return this;
  }

  async request(req: TransportRequest): Promise<unknown> {
    this.requests.push(req);
    const next = this.replies.shift();
    if (next instanceof Error) throw next;
    return next;
  }
}

function makeClient(transport: Transport): ChatClient {
  return new ChatClient({
    site: 'https://chat.example.test',
    email: 'bot@example.test',
    apiKey: 'test-secret',
    transport,
  });
}

describe('ChatClient', () => {
  it('registers a queue with event types and narrow', async () => {
    const transport = new FakeTransport().reply({ result: 'success', queue_id: 'q-1', last_event_id: -1 });
    const client = makeClient(transport);

    const registration = await client.registerQueue({
      eventTypes: ['message'],
      narrow: [['stream', 'general']],
    });

    expect(registration).toEqual({ queueId: 'q-1', lastEventId: -1 });
    expect(transport.requests[0]).toMatchObject({
      method: 'POST',
      path: '/register',
      params: { event_types: ['message'], narrow: [['stream', 'general']] },
    });
  });

  it('returns events in order', async () => {
    const transport = new FakeTransport().reply({
      result: 'success',
      events: [
        { id: 3, type: 'heartbeat' },
        {
          id: 4,
          type: 'message',
          message: {
            id: 90,
            type: 'private',
            content: 'hi',
            sender_id: 7,
            sender_email: 'ada@example.test',
            sender_full_name: 'Ada',
          },
        },
      ],
    });
    const client = makeClient(transport);

    const events = await client.getEvents('q-1', 2);

    expect(events.map((e) => e.id)).toEqual([3, 4]);
    expect(events[1].message?.content).toBe('hi');
    expect(transport.requests[0]).toMatchObject({
      method: 'GET',
      path: '/events',
      params: { queue_id: 'q-1', last_event_id: 2 },
    });
  });

  it('drops a malformed message payload without failing the batch', async () => {
    const transport = new FakeTransport().reply({
      result: 'success',
      events: [{ id: 5, type: 'message', message: { id: 'not-a-number' } }],
    });
    const events = await makeClient(transport).getEvents('q-1', 4);
    expect(events).toHaveLength(1);
    expect(events[0].message).toBeUndefined();
  });

  it('maps an unknown queue id to QueueExpiredError', async () => {
    const transport = new FakeTransport().reply(
      new ChatApiError(BAD_EVENT_QUEUE_ID, 400, 'Bad event queue ID: q-1'),
    );
    const err = await makeClient(transport).getEvents('q-1', 2).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueueExpiredError);
    expect(err).toMatchObject({ queueId: 'q-1', message: 'Bad event queue ID: q-1' });
  });

  it('passes other API errors through', async () => {
    const transport = new FakeTransport().reply(new ChatApiError('BAD_NARROW', 400, 'Invalid narrow'));
    await expect(makeClient(transport).getEvents('q-1', 2)).rejects.toBeInstanceOf(ChatApiError);
  });

  it('rejects a response that does not match the expected shape', async () => {
    const transport = new FakeTransport().reply({ result: 'success' });
    const err = await makeClient(transport)
      .registerQueue({ eventTypes: ['message'], narrow: [] })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkFatalError);
    expect(err).toMatchObject({
      message: 'POST /register returned an unexpected body: queue_id, last_event_id',
    });
  });

  it('sends stream and private messages', async () => {
    const transport = new FakeTransport()
      .reply({ result: 'success', id: 101 })
      .reply({ result: 'success', id: 102 });
    const client = makeClient(transport);

    await expect(
      client.sendMessage({ type: 'stream', to: 'general', topic: 'news', content: 'hello' }),
    ).resolves.toBe(101);
    await expect(client.sendMessage({ type: 'private', to: [7, 8], content: 'psst' })).resolves.toBe(102);

    expect(transport.requests[0].params).toEqual({
      type: 'stream',
      to: 'general',
      topic: 'news',
      content: 'hello',
    });
    expect(transport.requests[1].params).toEqual({ type: 'private', to: [7, 8], content: 'psst' });
  });

  it('reads the flat profile and a wrapped user', async () => {
    const transport = new FakeTransport()
      .reply({ result: 'success', user_id: 1, email: 'bot@example.test', full_name: 'Relay Bot' })
      .reply({ result: 'success', user: { user_id: 7, email: 'ada@example.test', role: 200 } });
    const client = makeClient(transport);

    await expect(client.getProfile()).resolves.toMatchObject({ user_id: 1, full_name: 'Relay Bot' });
    const user = await client.getUser(7);
    expect(user.role).toBe(200);
    expect(transport.requests.map((r) => r.path)).toEqual(['/users/me', '/users/7']);
  });

  it('posts presence', async () => {
    const transport = new FakeTransport().reply({ result: 'success' });
    await makeClient(transport).updatePresence('active');
    expect(transport.requests[0]).toMatchObject({
      method: 'POST',
      path: '/users/me/presence',
      params: { status: 'active' },
    });
  });

  it('deletes a queue', async () => {
    const transport = new FakeTransport().reply({ result: 'success' });
    await makeClient(transport).deleteQueue('q-1');
    expect(transport.requests[0]).toMatchObject({
      method: 'DELETE',
      path: '/events',
      params: { queue_id: 'q-1' },
    });
  });
});

describe('roleNameFromCode', () => {
  it('maps known codes', () => {
    expect(roleNameFromCode(100)).toBe('owner');
    expect(roleNameFromCode(300)).toBe('moderator');
    expect(roleNameFromCode(400)).toBe('member');
    expect(roleNameFromCode(600)).toBe('guest');
  });

  it('has no role for unknown or missing codes', () => {
    expect(roleNameFromCode(999)).toBeUndefined();
    expect(roleNameFromCode(undefined)).toBeUndefined();
  });
});
