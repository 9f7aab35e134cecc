import type {
  AutoFlushHandle,
  AutoFlushOptions,
  CacheLayer,
  FlushOptions,
  FlushResult,
  JsonValue,
} from './cache-layer.js';

/**
 * A bot's view of the cache layer, bound to its namespace.
 */
export class BotStorage {
  constructor(
    private readonly cache: CacheLayer,
    readonly namespace: string,
  ) {}

  async get(key: string): Promise<JsonValue | undefined>;
  async get<D>(key: string, fallback: D): Promise<JsonValue | D>;
  async get<D>(key: string, fallback?: D): Promise<JsonValue | D | undefined> {
    return this.cache.get(this.namespace, key, fallback);
  }

  /** Numeric value of `key`, or `fallback` when absent or not a number. */
  async getNumber(key: string, fallback: number): Promise<number> {
    const value = await this.cache.get(this.namespace, key);
    return typeof value === 'number' ? value : fallback;
  }

  put(key: string, value: JsonValue): void {
    this.cache.put(this.namespace, key, value);
  }

  delete(key: string): void {
    this.cache.delete(this.namespace, key);
  }

  keys(): Promise<string[]> {
    return this.cache.keys(this.namespace);
  }

  flush(options?: FlushOptions): Promise<FlushResult> {
    return this.cache.flush(this.namespace, options);
  }

  autoFlush(options: AutoFlushOptions): AutoFlushHandle {
    return this.cache.autoFlush(this.namespace, options);
  }

  /**
   * Run `fn` against this storage and flush afterwards, whether or not it
   * threw. Writes inside `fn` stay in memory until then.
   */
  async cached<T>(fn: (storage: BotStorage) => T | Promise<T>): Promise<T> {
    try {
      return await fn(this);
    } finally {
      await this.flush();
    }
  }
}
