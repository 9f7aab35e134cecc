// Bot runtime: event loop, command engine, cache layer and bot lifecycle
export { BaseBot } from './bot.js';
export type { BaseBotOptions, BotClient, CommandContext } from './bot.js';
export { BotStorage } from './bot-storage.js';
export { CacheLayer } from './cache-layer.js';
export type {
  AutoFlushHandle,
  AutoFlushOptions,
  CacheEntry,
  CacheLayerOptions,
  FlushOptions,
  FlushResult,
  JsonValue,
} from './cache-layer.js';
export { CommandGrammar, coerceToken, tokenize } from './command-grammar.js';
export type { GrammarOptions, IdentityAliases } from './command-grammar.js';
export { CommandRegistry } from './command-registry.js';
export type { CommandRegistryOptions } from './command-registry.js';
export {
  argument,
  booleanArg,
  defineCommand,
  listArg,
  numberArg,
  stringArg,
} from './command-types.js';
export type {
  ArgumentKind,
  ArgumentValue,
  CommandArgument,
  CommandDefinition,
  CommandHandler,
  CommandInvocation,
  CommandSpec,
  PermissionContext,
  ScalarValue,
} from './command-types.js';
export { initDatabase, getDatabase, closeDatabase, openDatabase } from './db/connection.js';
export { MemoryKeyValueStore, SqliteKeyValueStore, classifyStoreError } from './db/kv-store.js';
export type { KeyValueStore } from './db/kv-store.js';
export { Dispatcher, resolvePermissionContext } from './dispatcher.js';
export type { DispatchOutcome, DispatchStatus, DispatcherOptions, HandlerInvoker } from './dispatcher.js';
export { EventSource } from './event-source.js';
export type { EventHandler, EventQueue, EventSourceOptions, EventSourceState } from './event-source.js';
export { Translator, interpolate, setLanguage, getLanguage } from './i18n/index.js';
export type { Translate, TranslationRecord, TranslationTables } from './i18n/index.js';
export { backoffDelay, withRetry } from './retry.js';
export type { RetryOptions, SleepFn } from './retry.js';
export { BotRunner, runAllBots } from './runner.js';
export type { BotRunnerOptions } from './runner.js';
