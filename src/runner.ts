/**
 * BotRunner - owns one bot's lifecycle: start-up, the event loop, the
 * auto-flush timer and an orderly stop with a final flush.
 */
import { formatError, type CachePolicy, type Logger, type RetryPolicy } from '@relaybot/core';
import type { EventBus } from '@relaybot/event-bus';

import type { BaseBot } from './bot.js';
import type { AutoFlushHandle } from './cache-layer.js';
import { EventSource } from './event-source.js';
import type { SleepFn } from './retry.js';

export interface BotRunnerOptions {
  bot: BaseBot;
  eventTypes?: readonly string[];
  narrow?: readonly (readonly string[])[];
  retry: RetryPolicy;
  cache: CachePolicy;
  bus?: EventBus;
  logger?: Logger;
  sleep?: SleepFn;
}

export class BotRunner {
  readonly bot: BaseBot;
  readonly source: EventSource;
  private readonly eventTypes: readonly string[];
  private readonly narrow: readonly (readonly string[])[];
  private readonly cache: CachePolicy;
  private readonly bus?: EventBus;
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private autoFlushHandle: AutoFlushHandle | null = null;
  private started = false;
  private stopping: Promise<void> | null = null;

  constructor(options: BotRunnerOptions) {
    this.bot = options.bot;
    this.eventTypes = options.eventTypes ?? ['message'];
    this.narrow = options.narrow ?? [];
    this.cache = options.cache;
    this.bus = options.bus;
    this.logger = options.logger ?? options.bot.logger;
    this.source = new EventSource({
      api: options.bot.client,
      retry: options.retry,
      bot: options.bot.name,
      bus: options.bus,
      logger: this.logger,
      sleep: options.sleep,
    });
  }

  get name(): string {
    return this.bot.name;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    await this.bot.postInit();
    if (this.bot.storage) {
      this.autoFlushHandle = this.bot.storage.autoFlush({
        intervalMs: this.cache.flushIntervalMs,
        retryDelayMs: this.cache.retryDelayMs,
        maxRetries: this.cache.maxRetries,
      });
    }
    await this.bot.onStart();
    this.bus?.emit('bot:started', { bot: this.bot.name, userId: this.bot.userId ?? -1 });
    this.logger.info({ eventTypes: this.eventTypes }, 'Bot started');
  }

  /**
   * Poll until `signal` (or stop()) cancels, or a fatal error rejects.
   */
  async runForever(signal?: AbortSignal): Promise<void> {
    const onAbort = () => this.controller.abort();
    if (signal?.aborted) this.controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      await this.source.run(
        (event) => this.bot.onEvent(event),
        this.eventTypes,
        this.narrow,
        this.controller.signal,
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /** start(), runForever() and stop(), whatever happens in between. */
  async run(signal?: AbortSignal): Promise<void> {
    try {
      await this.start();
      await this.runForever(signal);
    } finally {
      await this.stop();
    }
  }

  /** Idempotent. */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.controller.abort();
    if (this.autoFlushHandle) {
      await this.autoFlushHandle.stop();
      this.autoFlushHandle = null;
    }
    if (this.bot.storage) {
      const result = await this.bot.storage.flush({
        maxRetries: this.cache.maxRetries,
        retryDelayMs: this.cache.retryDelayMs,
      });
      if (result.pending > 0) {
        this.logger.warn({ pending: result.pending, failedKeys: result.failedKeys }, 'Unflushed cache entries at shutdown');
      }
    }
    try {
      await this.bot.onStop();
    } catch (err) {
      this.logger.error({ err: formatError(err) }, 'onStop hook failed');
    }
    this.bus?.emit('bot:stopped', { bot: this.bot.name });
    this.logger.info({}, 'Bot stopped');
  }
}

/**
 * Run every runner until `signal` aborts. The first runner to fail stops
 * the others, and its error is rethrown once all have stopped.
 */
export async function runAllBots(runners: readonly BotRunner[], signal: AbortSignal): Promise<void> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (signal.aborted) controller.abort();
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    const results = await Promise.allSettled(
      runners.map(async (runner) => {
        try {
          await runner.run(controller.signal);
        } catch (err) {
          runner.bot.logger.error({ err: formatError(err) }, 'Bot failed; stopping all bots');
          controller.abort();
          throw err;
        }
      }),
    );
    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failure) throw failure.reason;
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}
