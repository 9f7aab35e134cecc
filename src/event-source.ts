/**
 * EventSource - keeps a server-side event queue alive and feeds its events,
 * in order, to a handler.
 *
 * State machine:
 *   unregistered -> registered -> polling -> polling
 *                                        \-> registered (queue expired)
 *   any -> closed (cancellation or fatal error)
 *
 * Delivery is at-most-once: when a queue expires mid-stream the events
 * between the last delivered id and the new registration may be lost. The
 * gap is logged; nothing is replayed.
 */
import type { ChatEvent, EventQueueApi } from '@relaybot/chat-client';
import {
  QueueExpiredError,
  formatError,
  isAbortError,
  logger as defaultLogger,
  type Logger,
  type RetryPolicy,
} from '@relaybot/core';
import type { EventBus } from '@relaybot/event-bus';

import { withRetry, type RetryOptions, type SleepFn } from './retry.js';

export type EventSourceState = 'unregistered' | 'registered' | 'polling' | 'closed';

export interface EventQueue {
  readonly queueId: string;
  /** Highest event id seen on this queue. Never decreases. */
  lastEventId: number;
  readonly eventTypes: readonly string[];
  readonly narrow: readonly (readonly string[])[];
}

export type EventHandler = (event: ChatEvent) => void | Promise<void>;

export interface EventSourceOptions {
  api: EventQueueApi;
  retry: RetryPolicy;
  bot?: string;
  bus?: EventBus;
  logger?: Logger;
  sleep?: SleepFn;
}

const HEARTBEAT = 'heartbeat';

export class EventSource {
  private readonly api: EventQueueApi;
  private readonly retry: RetryPolicy;
  private readonly bot: string;
  private readonly bus?: EventBus;
  private readonly logger: Logger;
  private readonly sleep?: SleepFn;
  private _state: EventSourceState = 'unregistered';
  private _queue: EventQueue | null = null;

  constructor(options: EventSourceOptions) {
    this.api = options.api;
    this.retry = options.retry;
    this.bot = options.bot ?? 'SYSTEM';
    this.bus = options.bus;
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep;
  }

  get state(): EventSourceState {
    return this._state;
  }

  /** The live queue, or null before registration and after closing. */
  get queue(): EventQueue | null {
    return this._queue;
  }

  async register(
    eventTypes: readonly string[],
    narrow: readonly (readonly string[])[],
    signal?: AbortSignal,
  ): Promise<EventQueue> {
    const registration = await withRetry(
      () => this.api.registerQueue({ eventTypes, narrow }, signal),
      this.retryOptions('register', signal),
    );
    const queue: EventQueue = {
      queueId: registration.queueId,
      lastEventId: registration.lastEventId,
      eventTypes,
      narrow,
    };
    this._queue = queue;
    this._state = 'registered';
    this.logger.info(
      { queueId: queue.queueId, lastEventId: queue.lastEventId },
      'Event queue registered',
    );
    this.bus?.emit('queue:registered', {
      bot: this.bot,
      queueId: queue.queueId,
      lastEventId: queue.lastEventId,
    });
    return queue;
  }

  /**
   * One long-poll round trip. Transient failures are retried here;
   * QueueExpiredError and fatal errors reach the caller.
   */
  async poll(queue: EventQueue, signal?: AbortSignal): Promise<ChatEvent[]> {
    return withRetry(
      () => this.api.getEvents(queue.queueId, queue.lastEventId, signal),
      this.retryOptions('poll', signal),
    );
  }

  /** Best-effort: a failure is logged, never thrown. */
  async deregister(queue: EventQueue): Promise<void> {
    try {
      await this.api.deleteQueue(queue.queueId);
      this.logger.debug({ queueId: queue.queueId }, 'Event queue deregistered');
    } catch (err) {
      this.logger.warn(
        { queueId: queue.queueId, err: formatError(err) },
        'Failed to deregister event queue',
      );
    }
    if (this._queue === queue) this._queue = null;
  }

  /**
   * Register, then poll until `signal` aborts (resolves) or a fatal error
   * occurs (rejects). Each event is awaited before the next one is handed
   * over, and the next poll starts only after the whole batch.
   */
  async run(
    handler: EventHandler,
    eventTypes: readonly string[],
    narrow: readonly (readonly string[])[],
    signal: AbortSignal,
  ): Promise<void> {
    if (this._state === 'closed') {
      throw new Error('EventSource is closed');
    }
    let reason: 'cancelled' | 'fatal' = 'cancelled';
    try {
      if (signal.aborted) return;
      let queue = await this.register(eventTypes, narrow, signal);
      let lastDeliveredId = queue.lastEventId;

      while (!signal.aborted) {
        this._state = 'polling';
        let events: ChatEvent[];
        try {
          events = await this.poll(queue, signal);
        } catch (err) {
          if (!(err instanceof QueueExpiredError)) throw err;
          queue = await this.recover(queue, lastDeliveredId, signal);
          continue;
        }

        for (const event of events) {
          if (event.id > queue.lastEventId) queue.lastEventId = event.id;
        }

        for (const event of events) {
          if (signal.aborted) break;
          if (event.type === HEARTBEAT) continue;
          await this.deliver(handler, event);
          lastDeliveredId = event.id;
        }
      }
    } catch (err) {
      if (!isAbortError(err)) {
        reason = 'fatal';
        this.logger.error({ err: formatError(err) }, 'Event loop stopped on a fatal error');
        throw err;
      }
    } finally {
      const queue = this._queue;
      this._state = 'closed';
      if (queue && reason === 'cancelled') {
        await this.deregister(queue);
      }
      this._queue = null;
      this.bus?.emit('queue:closed', { bot: this.bot, reason });
    }
  }

  private async recover(
    expired: EventQueue,
    lastDeliveredId: number,
    signal: AbortSignal,
  ): Promise<EventQueue> {
    this._state = 'unregistered';
    this._queue = null;
    this.bus?.emit('queue:expired', {
      bot: this.bot,
      queueId: expired.queueId,
      lastDeliveredId,
    });
    const fresh = await this.register(expired.eventTypes, expired.narrow, signal);
    this.logger.warn(
      {
        expiredQueueId: expired.queueId,
        lastDeliveredId,
        newQueueId: fresh.queueId,
        resumeFromId: fresh.lastEventId,
      },
      'Event queue expired; events between the last delivered id and the new queue may be lost',
    );
    return fresh;
  }

  private async deliver(handler: EventHandler, event: ChatEvent): Promise<void> {
    try {
      await handler(event);
    } catch (err) {
      this.logger.error(
        { eventId: event.id, eventType: event.type, err: formatError(err) },
        'Event handler failed',
      );
      this.bus?.emit('event:handler-failed', {
        bot: this.bot,
        eventId: event.id,
        eventType: event.type,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private retryOptions(label: string, signal?: AbortSignal): RetryOptions {
    return {
      policy: this.retry,
      signal,
      sleep: this.sleep,
      logger: this.logger,
      label,
      onRetry: (attempt: number, delayMs: number, error: Error) => {
        this.bus?.emit('poll:retry', {
          bot: this.bot,
          attempt,
          delayMs,
          error: error.message,
        });
      },
    };
  }
}
