/**
 * Counter bot: keeps a counter in the bot's storage.
 *
 *   !count   increment and show the counter
 *   !reset   set the counter back to zero (moderators and up)
 *   !stats   show the counter, the message total and the stored keys
 */
import type { Message } from '@relaybot/chat-client';

import {
  BaseBot,
  type BaseBotOptions,
  type TranslationTables,
} from '../../src/index.js';

export const COUNTER_TRANSLATIONS: TranslationTables = {
  en: {
    'counter.count': 'Count: **{counter}** (Total messages: {total})',
    'counter.reset': 'Counter reset to 0',
    'counter.stats':
      '**Statistics**\n\nCurrent counter: **{counter}**\nTotal messages: **{total}**\nAvailable keys: {keys}',
    'counter.noKeys': 'none',
    'counter.noStorage': 'Storage is not enabled!',
  },
  'zh-TW': {
    'counter.count': '計數：**{counter}**（訊息總數：{total}）',
    'counter.reset': '計數已歸零',
    'counter.stats': '**統計**\n\n目前計數：**{counter}**\n訊息總數：**{total}**\n已存鍵值：{keys}',
    'counter.noKeys': '無',
    'counter.noStorage': '尚未啟用儲存空間！',
  },
};

/** Level needed for !reset unless the manifest sets `config.resetLevel`. */
const DEFAULT_RESET_LEVEL = 50;

export class CounterBot extends BaseBot {
  protected registerCommands(): void {
    const resetLevel = this.settings.resetLevel;
    this.registry.register({
      name: 'count',
      description: 'Increment counter and show current count',
      aliases: ['inc'],
      handler: () => this.count(),
    });
    this.registry.register({
      name: 'reset',
      description: 'Reset counter to zero',
      minLevel: typeof resetLevel === 'number' ? resetLevel : DEFAULT_RESET_LEVEL,
      handler: () => this.reset(),
    });
    this.registry.register({
      name: 'stats',
      description: 'Show detailed statistics',
      handler: () => this.stats(),
    });
  }

  private async count(): Promise<string> {
    const storage = this.storage;
    if (!storage) return this.t('counter.noStorage');
    const { counter, total } = await storage.cached(async (s) => {
      const next = {
        counter: (await s.getNumber('counter', 0)) + 1,
        total: (await s.getNumber('total_messages', 0)) + 1,
      };
      s.put('counter', next.counter);
      s.put('total_messages', next.total);
      return next;
    });
    return this.t('counter.count', { counter, total });
  }

  private async reset(): Promise<string> {
    const storage = this.storage;
    if (!storage) return this.t('counter.noStorage');
    storage.put('counter', 0);
    await storage.flush();
    return this.t('counter.reset');
  }

  private async stats(): Promise<string> {
    const storage = this.storage;
    if (!storage) return this.t('counter.noStorage');
    const counter = await storage.getNumber('counter', 0);
    const total = await storage.getNumber('total_messages', 0);
    const keys = await storage.keys();
    return this.t('counter.stats', {
      counter,
      total,
      keys: keys.length > 0 ? keys.join(', ') : this.t('counter.noKeys'),
    });
  }

  async onMessage(message: Message): Promise<void> {
    this.logger.debug({ preview: message.content.slice(0, 50) }, 'Non-command message ignored');
  }
}

export function createBot(options: BaseBotOptions): CounterBot {
  return new CounterBot({ ...options, translations: COUNTER_TRANSLATIONS });
}
