/**
 * Bot Loader
 *
 * Resolves a manifest entry to a module under the bots directory, imports it
 * and builds the bot. A module exports either `createBot(options)` or a
 * default class extending BaseBot.
 */
import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';

import { logger } from '@relaybot/core/logger';

import { BaseBot, type BaseBotOptions } from '../../src/index.js';
import type { BotClass, BotEntry, BotFactory, LoadedBot } from './bot-types.js';

const ENTRY_CANDIDATES = ['index.ts', 'index.js'];

export class BotLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BotLoadError';
  }
}

function isBotClass(value: unknown): value is BotClass {
  return typeof value === 'function' && value.prototype instanceof BaseBot;
}

function isBotFactory(value: unknown): value is BotFactory {
  return typeof value === 'function' && !isBotClass(value);
}

/**
 * Absolute path of the entry file for `module`. The result must stay inside
 * `botsDir`.
 */
export function resolveBotModule(module: string, botsDir: string): string {
  const root = path.resolve(botsDir);
  const target = path.resolve(root, module);
  if (!target.startsWith(root + path.sep)) {
    throw new BotLoadError(`Bot module escapes the bots directory: ${module}`);
  }

  if (fs.existsSync(target) && fs.statSync(target).isDirectory()) {
    for (const candidate of ENTRY_CANDIDATES) {
      const file = path.join(target, candidate);
      if (fs.existsSync(file)) return file;
    }
    throw new BotLoadError(`No index.ts or index.js in bot directory ${target}`);
  }
  if (fs.existsSync(target)) return target;
  throw new BotLoadError(`Bot module not found: ${target}`);
}

/** Pick the constructor out of an imported module namespace. */
export async function instantiateBot(
  mod: unknown,
  options: BaseBotOptions,
  source: string,
): Promise<BaseBot> {
  if (typeof mod !== 'object' || mod === null) {
    throw new BotLoadError(`${source} did not evaluate to a module`);
  }

  let bot: unknown;
  if ('createBot' in mod && isBotFactory(mod.createBot)) {
    bot = await mod.createBot(options);
  } else if ('default' in mod && isBotClass(mod.default)) {
    bot = new mod.default(options);
  } else if ('default' in mod && isBotFactory(mod.default)) {
    bot = await mod.default(options);
  } else {
    throw new BotLoadError(`${source} exports neither createBot() nor a default BaseBot class`);
  }

  if (!(bot instanceof BaseBot)) {
    throw new BotLoadError(`${source} produced something that is not a BaseBot`);
  }
  return bot;
}

export async function loadBot(
  entry: BotEntry,
  botsDir: string,
  options: BaseBotOptions,
): Promise<LoadedBot> {
  const source = resolveBotModule(entry.module, botsDir);
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(source).href);
  } catch (err) {
    throw new BotLoadError(`Failed to import bot module ${source}`, { cause: err });
  }
  const bot = await instantiateBot(mod, options, source);
  logger.info({ bot: entry.name, source }, 'Bot loaded');
  return { entry, bot, source };
}
