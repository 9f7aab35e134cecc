/**
 * Typed client for the handful of chat-service endpoints the runtime needs:
 * event queues, sending messages, the bot's own profile, other users' roles
 * and presence.
 */
import { ChatApiError, NetworkFatalError, QueueExpiredError } from '@relaybot/core';
import type { z } from 'zod';

import {
  eventsResponseSchema,
  registerResponseSchema,
  sendMessageResponseSchema,
  userSchema,
  wrappedUserSchema,
  type ChatEvent,
  type PresenceStatus,
  type SendMessageRequest,
  type User,
} from './schemas.js';
import { FetchTransport, type Transport, type TransportRequest } from './transport.js';

/** API error code the server uses for an expired or unknown queue. */
export const BAD_EVENT_QUEUE_ID = 'BAD_EVENT_QUEUE_ID';

export interface QueueRegistration {
  queueId: string;
  lastEventId: number;
}

export interface RegisterQueueParams {
  eventTypes: readonly string[];
  narrow: readonly (readonly string[])[];
}

/**
 * The slice of the API an event source needs. ChatClient implements it;
 * tests substitute an in-memory fake.
 */
export interface EventQueueApi {
  registerQueue(params: RegisterQueueParams, signal?: AbortSignal): Promise<QueueRegistration>;
  getEvents(queueId: string, lastEventId: number, signal?: AbortSignal): Promise<ChatEvent[]>;
  deleteQueue(queueId: string): Promise<void>;
}

export interface ChatClientOptions {
  site: string;
  email: string;
  apiKey: string;
  timeoutMs?: number;
  /** Injected transport; defaults to a fetch-based one built from the options above. */
  transport?: Transport;
}

export class ChatClient implements EventQueueApi {
  readonly email: string;
  private readonly transport: Transport;

  constructor(options: ChatClientOptions) {
    this.email = options.email;
    this.transport =
      options.transport ??
      new FetchTransport({
        site: options.site,
        email: options.email,
        apiKey: options.apiKey,
        timeoutMs: options.timeoutMs,
      });
  }

  // ==========================================================================
  // Event queues
  // ==========================================================================

  async registerQueue(
    params: RegisterQueueParams,
    signal?: AbortSignal,
  ): Promise<QueueRegistration> {
    const body = await this.call(
      {
        method: 'POST',
        path: '/register',
        params: { event_types: params.eventTypes, narrow: params.narrow },
        signal,
      },
      registerResponseSchema,
    );
    return { queueId: body.queue_id, lastEventId: body.last_event_id };
  }

  async getEvents(
    queueId: string,
    lastEventId: number,
    signal?: AbortSignal,
  ): Promise<ChatEvent[]> {
    try {
      const body = await this.call(
        {
          method: 'GET',
          path: '/events',
          params: { queue_id: queueId, last_event_id: lastEventId },
          signal,
        },
        eventsResponseSchema,
      );
      return body.events;
    } catch (err) {
      if (err instanceof ChatApiError && err.apiCode === BAD_EVENT_QUEUE_ID) {
        throw new QueueExpiredError(queueId, err.message || undefined);
      }
      throw err;
    }
  }

  async deleteQueue(queueId: string): Promise<void> {
    await this.transport.request({
      method: 'DELETE',
      path: '/events',
      params: { queue_id: queueId },
    });
  }

  // ==========================================================================
  // Messages, users, presence
  // ==========================================================================

  async sendMessage(request: SendMessageRequest): Promise<number> {
    const body = await this.call(
      {
        method: 'POST',
        path: '/messages',
        params:
          request.type === 'stream'
            ? { type: 'stream', to: request.to, topic: request.topic, content: request.content }
            : { type: 'private', to: request.to, content: request.content },
      },
      sendMessageResponseSchema,
    );
    return body.id;
  }

  async getProfile(): Promise<User> {
    return this.fetchUser('/users/me');
  }

  async getUser(userId: number): Promise<User> {
    return this.fetchUser(`/users/${userId}`);
  }

  async updatePresence(status: PresenceStatus): Promise<void> {
    await this.transport.request({
      method: 'POST',
      path: '/users/me/presence',
      params: { status, new_user_input: false, ping_only: true },
    });
  }

  /** `/users/me` answers with a flat user, `/users/{id}` wraps it in `user`. */
  private async fetchUser(path: string): Promise<User> {
    const req: TransportRequest = { method: 'GET', path };
    const raw = await this.transport.request(req);
    const wrapped = wrappedUserSchema.safeParse(raw);
    if (wrapped.success) return wrapped.data.user;
    return this.validate(req, raw, userSchema);
  }

  private async call<S extends z.ZodTypeAny>(
    req: TransportRequest,
    schema: S,
  ): Promise<z.output<S>> {
    const raw = await this.transport.request(req);
    return this.validate(req, raw, schema);
  }

  private validate<S extends z.ZodTypeAny>(
    req: TransportRequest,
    raw: unknown,
    schema: S,
  ): z.output<S> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new NetworkFatalError(
        `${req.method} ${req.path} returned an unexpected body: ${parsed.error.issues
          .map((issue) => issue.path.join('.') || issue.message)
          .join(', ')}`,
      );
    }
    return parsed.data;
  }
}
