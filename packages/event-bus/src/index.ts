export type { RelayEventMap } from './types.js';
export { EventBus } from './event-bus.js';
export type {
  EventBusOptions,
  EventRecord,
  RelayEventHandler,
  RelayEventName,
} from './event-bus.js';

import { EventBus, type EventBusOptions } from './event-bus.js';

let instance: EventBus | null = null;

/** Create the process-wide EventBus. Subsequent calls return the same instance. */
export function createEventBus(options?: EventBusOptions): EventBus {
  if (!instance) {
    instance = new EventBus(options);
  }
  return instance;
}

/** Get the process-wide EventBus, creating it with defaults on first use. */
export function getEventBus(): EventBus {
  return createEventBus();
}

/** Destroy and reset the singleton. Intended for tests. */
export function resetEventBus(): void {
  if (instance) {
    instance.destroy();
    instance = null;
  }
}
