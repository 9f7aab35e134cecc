/**
 * CacheLayer - namespaced write-back cache in front of a KeyValueStore.
 *
 * put() and delete() only touch memory and mark the entry dirty; flush()
 * persists dirty entries. Values are JSON-encoded when they are written and
 * decoded on every read, so callers never share an object with the cache.
 *
 * An entry is clean only after the store accepted the exact version that was
 * written; a write that lands while its flush is in flight keeps it dirty.
 * Flushes of one namespace never overlap: while one runs, later requests
 * share a single follow-up flush.
 */
import {
  StoreBusyError,
  formatError,
  isAbortError,
  logger as defaultLogger,
  sleep as defaultSleep,
  type Logger,
} from '@relaybot/core';
import type { EventBus } from '@relaybot/event-bus';

import type { KeyValueStore } from './db/kv-store.js';
import type { SleepFn } from './retry.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface CacheEntry {
  key: string;
  /** JSON text as it goes to the store; undefined once deleted. */
  encoded: string | undefined;
  dirty: boolean;
  /** Pending removal; the entry reads as absent. */
  deleted: boolean;
  /** Bumped on every local write. */
  version: number;
  lastWriteAt: number;
}

export interface FlushOptions {
  signal?: AbortSignal;
  /** Total persist attempts per entry. Default 5. */
  maxRetries?: number;
  /** Wait between attempts on StoreBusyError. Default 100 ms. */
  retryDelayMs?: number;
}

export interface FlushResult {
  flushed: number;
  /** Entries still dirty after this flush. */
  pending: number;
  failedKeys: string[];
}

export interface AutoFlushOptions {
  intervalMs: number;
  retryDelayMs: number;
  maxRetries: number;
}

export interface AutoFlushHandle {
  readonly namespace: string;
  /** Cancel the timer and wait for an in-flight flush to settle. */
  stop(): Promise<void>;
}

export interface CacheLayerOptions {
  store: KeyValueStore;
  logger?: Logger;
  bus?: EventBus;
  sleep?: SleepFn;
}

const DEFAULT_MAX_RETRIES = 5;
const DEFAULT_RETRY_DELAY_MS = 100;

export class CacheLayer {
  private readonly store: KeyValueStore;
  private readonly logger: Logger;
  private readonly bus?: EventBus;
  private readonly sleep: SleepFn;
  private readonly namespaces = new Map<string, Map<string, CacheEntry>>();
  private readonly running = new Map<string, Promise<FlushResult>>();
  private readonly queued = new Map<string, Promise<FlushResult>>();

  constructor(options: CacheLayerOptions) {
    this.store = options.store;
    this.logger = options.logger ?? defaultLogger;
    this.bus = options.bus;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Read-through: memory first, then the store (which populates memory). */
  async get(namespace: string, key: string): Promise<JsonValue | undefined>;
  async get<D>(namespace: string, key: string, fallback: D): Promise<JsonValue | D>;
  async get<D>(
    namespace: string,
    key: string,
    fallback?: D,
  ): Promise<JsonValue | D | undefined> {
    const cached = this.bucket(namespace).get(key);
    if (cached) return readEntry(cached, fallback);

    const raw = await this.store.get(namespace, key);

    // A local write may have landed while the store was read
    const raced = this.bucket(namespace).get(key);
    if (raced) return readEntry(raced, fallback);

    if (raw === undefined) return fallback;
    this.bucket(namespace).set(key, {
      key,
      encoded: raw,
      dirty: false,
      deleted: false,
      version: 0,
      lastWriteAt: 0,
    });
    return decode(raw);
  }

  put(namespace: string, key: string, value: JsonValue): void {
    this.write(namespace, key, JSON.stringify(value), false);
  }

  delete(namespace: string, key: string): void {
    this.write(namespace, key, undefined, true);
  }

  /** Keys visible in `namespace`, unflushed writes included, sorted. */
  async keys(namespace: string): Promise<string[]> {
    const stored = await this.store.keys(namespace);
    const visible = new Set(stored);
    for (const entry of this.bucket(namespace).values()) {
      if (entry.deleted) visible.delete(entry.key);
      else visible.add(entry.key);
    }
    return [...visible].sort();
  }

  isDirty(namespace: string, key: string): boolean {
    return this.bucket(namespace).get(key)?.dirty ?? false;
  }

  pendingCount(namespace: string): number {
    let count = 0;
    for (const entry of this.bucket(namespace).values()) {
      if (entry.dirty) count++;
    }
    return count;
  }

  /** Drop clean entries so the next read goes to the store. */
  evictClean(namespace: string): void {
    const bucket = this.bucket(namespace);
    for (const [key, entry] of bucket) {
      if (!entry.dirty) bucket.delete(key);
    }
  }

  /**
   * Persist every dirty entry of `namespace`. Store failures are logged and
   * reported in the result, never thrown; the entries stay dirty for the
   * next flush. Aborting stops between entries and between attempts.
   *
   * A call made while a flush of `namespace` runs waits for it and then
   * flushes again; calls made while that follow-up is waiting join it and
   * get its result (and the first caller's options).
   */
  flush(namespace: string, options: FlushOptions = {}): Promise<FlushResult> {
    const waiting = this.queued.get(namespace);
    if (waiting) return waiting;

    const current = this.running.get(namespace);
    if (!current) return this.startFlush(namespace, options);

    const next = () => {
      this.queued.delete(namespace);
      return this.startFlush(namespace, options);
    };
    const followUp = current.then(next, next);
    this.queued.set(namespace, followUp);
    return followUp;
  }

  autoFlush(namespace: string, options: AutoFlushOptions): AutoFlushHandle {
    const controller = new AbortController();
    const { signal } = controller;

    const loop = async (): Promise<void> => {
      while (!signal.aborted) {
        try {
          await this.sleep(options.intervalMs, signal);
          await this.flush(namespace, {
            signal,
            maxRetries: options.maxRetries,
            retryDelayMs: options.retryDelayMs,
          });
        } catch (err) {
          if (isAbortError(err)) return;
          this.logger.error({ namespace, err: formatError(err) }, 'Auto-flush cycle failed');
        }
      }
    };
    const running = loop();

    this.logger.debug({ namespace, intervalMs: options.intervalMs }, 'Auto-flush started');
    return {
      namespace,
      stop: async () => {
        controller.abort();
        await running;
        this.logger.debug({ namespace }, 'Auto-flush stopped');
      },
    };
  }

  private startFlush(namespace: string, options: FlushOptions): Promise<FlushResult> {
    // The body starts a tick later, once `run` is registered
    const run = Promise.resolve()
      .then(() => this.flushNamespace(namespace, options))
      .finally(() => {
        if (this.running.get(namespace) === run) this.running.delete(namespace);
      });
    this.running.set(namespace, run);
    return run;
  }

  private async flushNamespace(namespace: string, options: FlushOptions): Promise<FlushResult> {
    const maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    const bucket = this.bucket(namespace);
    const failedKeys: string[] = [];
    let flushed = 0;

    const dirty = [...bucket.values()].filter((entry) => entry.dirty);
    for (const entry of dirty) {
      if (options.signal?.aborted) break;
      const version = entry.version;
      const deleted = entry.deleted;
      const encoded = entry.encoded;

      try {
        await this.persist(namespace, entry.key, deleted ? undefined : encoded, {
          maxRetries,
          retryDelayMs,
          signal: options.signal,
        });
      } catch (err) {
        if (isAbortError(err)) break;
        failedKeys.push(entry.key);
        this.logger.warn(
          { namespace, key: entry.key, err: formatError(err) },
          'Cache entry not persisted; it stays dirty',
        );
        continue;
      }

      flushed++;
      if (entry.version === version) {
        entry.dirty = false;
        if (deleted && bucket.get(entry.key) === entry) bucket.delete(entry.key);
      }
    }

    const result: FlushResult = { flushed, pending: this.pendingCount(namespace), failedKeys };
    if (flushed > 0 || failedKeys.length > 0) {
      this.logger.debug({ namespace, ...result }, 'Cache flushed');
      this.bus?.emit('cache:flushed', { namespace, flushed, pending: result.pending });
    }
    return result;
  }

  private async persist(
    namespace: string,
    key: string,
    encoded: string | undefined,
    options: { maxRetries: number; retryDelayMs: number; signal?: AbortSignal },
  ): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        if (encoded === undefined) await this.store.delete(namespace, key);
        else await this.store.put(namespace, key, encoded);
        return;
      } catch (err) {
        if (!(err instanceof StoreBusyError) || attempt >= options.maxRetries) throw err;
        this.logger.debug({ namespace, key, attempt }, 'Store busy, retrying');
        await this.sleep(options.retryDelayMs, options.signal);
      }
    }
  }

  private write(namespace: string, key: string, encoded: string | undefined, deleted: boolean): void {
    const bucket = this.bucket(namespace);
    const entry = bucket.get(key);
    const now = Date.now();
    if (entry) {
      entry.encoded = encoded;
      entry.deleted = deleted;
      entry.dirty = true;
      entry.version++;
      entry.lastWriteAt = now;
      return;
    }
    bucket.set(key, { key, encoded, dirty: true, deleted, version: 1, lastWriteAt: now });
  }

  private bucket(namespace: string): Map<string, CacheEntry> {
    let bucket = this.namespaces.get(namespace);
    if (!bucket) {
      bucket = new Map();
      this.namespaces.set(namespace, bucket);
    }
    return bucket;
  }
}

function readEntry<D>(entry: CacheEntry, fallback: D | undefined): JsonValue | D | undefined {
  if (entry.deleted || entry.encoded === undefined) return fallback;
  return decode(entry.encoded);
}

function decode(raw: string): JsonValue {
  try {
    return JSON.parse(raw);
  } catch {
    // Written by something other than this layer; hand it back verbatim
    return raw;
  }
}
