/**
 * App-layer bot types: manifest entries and the shape of a bot module.
 */
import type { BaseBot, BaseBotOptions } from '../../src/index.js';
import type { BotEntry } from './bot-manifest.js';

export type { BotEntry, BotManifest } from './bot-manifest.js';

/** `export function createBot(options)` in a bot module. */
export type BotFactory = (options: BaseBotOptions) => BaseBot | Promise<BaseBot>;

/** `export default class MyBot extends BaseBot` in a bot module. */
export type BotClass = new (options: BaseBotOptions) => BaseBot;

export interface LoadedBot {
  entry: BotEntry;
  bot: BaseBot;
  /** Absolute path of the module the bot came from. */
  source: string;
}
