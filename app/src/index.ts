/**
 * Relaybot App Entry Point
 *
 * Loads configuration and the bot manifest, opens the shared store, builds
 * one runner per enabled bot and runs them until SIGINT or SIGTERM.
 */
import 'dotenv/config';

import { ChatClient } from '@relaybot/chat-client';
import { createConfig, formatError, type RelaybotConfig } from '@relaybot/core';
import { logger } from '@relaybot/core/logger';
import { createEventBus, type EventBus } from '@relaybot/event-bus';

import {
  BotRunner,
  BotStorage,
  CacheLayer,
  SqliteKeyValueStore,
  closeDatabase,
  initDatabase,
  runAllBots,
  setLanguage,
} from '../../src/index.js';
import { loadBot } from './bot-loader.js';
import { loadBotManifest } from './bot-manifest.js';
import type { BotEntry } from './bot-types.js';

async function buildRunner(
  entry: BotEntry,
  config: RelaybotConfig,
  cache: CacheLayer,
  bus: EventBus,
): Promise<BotRunner> {
  const apiKey = process.env[entry.apiKeyEnv];
  if (!apiKey) {
    throw new Error(`Bot ${entry.name}: environment variable ${entry.apiKeyEnv} is not set`);
  }

  const client = new ChatClient({
    site: entry.site,
    email: entry.email,
    apiKey,
    timeoutMs: config.requestTimeoutMs,
  });

  const { bot } = await loadBot(entry, config.botsDir, {
    name: entry.name,
    client,
    storage: new BotStorage(cache, entry.name),
    language: entry.language ?? config.language,
    bus,
    prefixes: entry.prefixes ?? config.commands.prefixes,
    enableMentions: entry.enableMentions ?? config.commands.enableMentions,
    autoHelp: config.commands.autoHelp,
    aliases: entry.aliases,
    roleLevels: { ...config.roleLevels, ...entry.roleLevels },
    userLevels: entry.userLevels,
    settings: entry.config,
  });

  return new BotRunner({
    bot,
    eventTypes: entry.eventTypes,
    narrow: entry.narrow,
    retry: config.retry,
    cache: config.cache,
    bus,
  });
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const config = createConfig();
  setLanguage(config.language);
  logger.info({ manifest: config.manifestPath, language: config.language }, 'Starting relaybot');

  const manifest = loadBotManifest(config.manifestPath);
  const enabled = manifest.bots.filter((entry) => entry.enabled);
  if (enabled.length === 0) {
    logger.warn({ manifest: config.manifestPath }, 'No enabled bots in manifest, nothing to do');
    return;
  }

  const db = initDatabase(config.storeDir);
  const bus = createEventBus();
  const cache = new CacheLayer({ store: new SqliteKeyValueStore(db), bus });

  const controller = new AbortController();
  const shutdown = (signal: string) => {
    if (controller.signal.aborted) return;
    logger.info({ signal }, 'Shutting down gracefully');
    controller.abort();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    const runners: BotRunner[] = [];
    for (const entry of enabled) {
      runners.push(await buildRunner(entry, config, cache, bus));
    }
    bus.emit('system:ready', {});
    await runAllBots(runners, controller.signal);
  } finally {
    bus.emit('system:shutdown', {});
    closeDatabase();
    logger.info({}, 'Database closed. Goodbye!');
  }
}

main().catch((err: unknown) => {
  logger.error({ err: formatError(err) }, 'Fatal error');
  process.exit(1);
});
