/**
 * Event type map for the bot runtime.
 * All payloads are plain data (no class instances, no functions).
 */
export interface RelayEventMap {
  'bot:started': {
    bot: string;
    userId: number;
  };
  'bot:stopped': {
    bot: string;
  };
  'queue:registered': {
    bot: string;
    queueId: string;
    lastEventId: number;
  };
  'queue:expired': {
    bot: string;
    queueId: string;
    lastDeliveredId: number;
  };
  'queue:closed': {
    bot: string;
    reason: 'cancelled' | 'fatal';
  };
  'poll:retry': {
    bot: string;
    attempt: number;
    delayMs: number;
    error: string;
  };
  'event:handler-failed': {
    bot: string;
    eventId: number;
    eventType: string;
    error: string;
  };
  'command:dispatched': {
    bot: string;
    command: string | null;
    status: string;
  };
  'cache:flushed': {
    namespace: string;
    flushed: number;
    pending: number;
  };
  'system:ready': Record<string, never>;
  'system:shutdown': Record<string, never>;
}
