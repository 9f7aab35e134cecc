/**
 * EventBus: typed in-process notifications about the runtime.
 *
 * - emit() calls every handler synchronously, in subscription order
 * - each handler is isolated: a throw or a rejected promise is logged and
 *   never reaches the emitter (the event loop must not die on an observer)
 * - a ring buffer keeps the most recent N records for inspection
 */
import { logger } from '@relaybot/core';
import type { RelayEventMap } from './types.js';

export type RelayEventName = keyof RelayEventMap;

export type RelayEventHandler<K extends RelayEventName> = (
  payload: RelayEventMap[K],
) => void | Promise<void>;

export interface EventRecord<K extends RelayEventName = RelayEventName> {
  event: K;
  payload: RelayEventMap[K];
  timestamp: number;
}

export interface EventBusOptions {
  /** Number of events to retain in the ring buffer (default: 100) */
  bufferSize?: number;
}

type HandlerSets = {
  [K in RelayEventName]?: Set<RelayEventHandler<K>>;
};

export class EventBus {
  private handlers: HandlerSets = {};
  private buffer: EventRecord[] = [];
  private readonly bufferSize: number;

  constructor(options?: EventBusOptions) {
    this.bufferSize = options?.bufferSize ?? 100;
  }

  emit<K extends RelayEventName>(event: K, payload: RelayEventMap[K]): void {
    if (this.buffer.length >= this.bufferSize) {
      this.buffer.shift();
    }
    const record: EventRecord<K> = { event, payload, timestamp: Date.now() };
    this.buffer.push(record);

    const set = this.handlersFor(event);
    if (!set) return;
    // Copy so handlers that unsubscribe during emit don't skip siblings
    for (const handler of [...set]) {
      try {
        const result = handler(payload);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            logger.error({ event, err }, 'Async event handler rejected');
          });
        }
      } catch (err) {
        logger.error({ event, err }, 'Event handler threw');
      }
    }
  }

  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends RelayEventName>(event: K, handler: RelayEventHandler<K>): () => void {
    let set = this.handlersFor(event);
    if (!set) {
      set = new Set<RelayEventHandler<K>>();
      this.setHandlers(event, set);
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  /** Resolve with the next payload of `event` that satisfies `predicate`. */
  once<K extends RelayEventName>(
    event: K,
    predicate: (payload: RelayEventMap[K]) => boolean = () => true,
  ): Promise<RelayEventMap[K]> {
    return new Promise<RelayEventMap[K]>((resolve) => {
      const unsubscribe = this.on(event, (payload) => {
        if (!predicate(payload)) return;
        unsubscribe();
        resolve(payload);
      });
    });
  }

  off<K extends RelayEventName>(event: K, handler: RelayEventHandler<K>): void {
    this.handlersFor(event)?.delete(handler);
  }

  listenerCount(event: RelayEventName): number {
    return this.handlersFor(event)?.size ?? 0;
  }

  /** Copy of the buffered records, oldest first, optionally for one event. */
  getBuffer(event?: RelayEventName): ReadonlyArray<EventRecord> {
    if (!event) return [...this.buffer];
    return this.buffer.filter((record) => record.event === event);
  }

  clearBuffer(): void {
    this.buffer = [];
  }

  /** Remove all listeners and clear the buffer. */
  destroy(): void {
    this.handlers = {};
    this.buffer = [];
  }

  private handlersFor<K extends RelayEventName>(event: K): Set<RelayEventHandler<K>> | undefined {
    return this.handlers[event];
  }

  private setHandlers<K extends RelayEventName>(event: K, set: Set<RelayEventHandler<K>>): void {
    const handlers: { [P in K]?: Set<RelayEventHandler<P>> } = this.handlers;
    handlers[event] = set;
  }
}
