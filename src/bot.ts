/**
 * BaseBot - the glue between one chat account, its commands and its storage.
 *
 * Subclasses register commands in registerCommands() and handle plain
 * messages in onMessage(). Commands are dispatched before onMessage is
 * considered.
 */
import {
  roleNameFromCode,
  type ChatClient,
  type ChatEvent,
  type EventQueueApi,
  type Message,
} from '@relaybot/chat-client';
import {
  DEFAULT_ROLE_LEVELS,
  createLogger,
  formatError,
  type Language,
  type Logger,
} from '@relaybot/core';
import type { EventBus } from '@relaybot/event-bus';

import type { BotStorage } from './bot-storage.js';
import { CommandGrammar } from './command-grammar.js';
import { CommandRegistry } from './command-registry.js';
import type { PermissionContext } from './command-types.js';
import { Dispatcher, resolvePermissionContext, type DispatchOutcome } from './dispatcher.js';
import { Translator, getLanguage, type TranslationTables } from './i18n/index.js';

/** The API surface a bot uses; ChatClient satisfies it. */
export type BotClient = EventQueueApi &
  Pick<ChatClient, 'sendMessage' | 'getProfile' | 'getUser' | 'updatePresence'>;

/** Second argument of every command handler. */
export interface CommandContext {
  bot: BaseBot;
  message: Message;
}

export interface BaseBotOptions {
  name: string;
  client: BotClient;
  storage?: BotStorage;
  language?: Language;
  translations?: TranslationTables;
  logger?: Logger;
  bus?: EventBus;
  prefixes?: readonly string[];
  enableMentions?: boolean;
  autoHelp?: boolean;
  /** Extra mention aliases on top of the ones derived from the profile. */
  aliases?: readonly string[];
  roleLevels?: Readonly<Record<string, number>>;
  /** Per-user level overrides, keyed by email. */
  userLevels?: Readonly<Record<string, number>>;
  /** Free-form settings from the manifest. */
  settings?: Readonly<Record<string, unknown>>;
}

export abstract class BaseBot {
  readonly name: string;
  readonly client: BotClient;
  readonly storage?: BotStorage;
  readonly translator: Translator;
  readonly registry: CommandRegistry<CommandContext>;
  readonly dispatcher: Dispatcher<CommandContext>;
  readonly logger: Logger;
  readonly settings: Readonly<Record<string, unknown>>;
  protected readonly roleLevels: Readonly<Record<string, number>>;
  protected readonly userLevels: Readonly<Record<string, number>>;
  private readonly extraAliases: readonly string[];
  private readonly roleCache = new Map<number, string | undefined>();
  private commandsRegistered = false;
  private _userId: number | null = null;

  constructor(options: BaseBotOptions) {
    this.name = options.name;
    this.client = options.client;
    this.storage = options.storage;
    this.logger = options.logger ?? createLogger(options.name);
    this.translator = new Translator(options.language ?? getLanguage(), options.translations);
    this.settings = options.settings ?? {};
    this.roleLevels = options.roleLevels ?? DEFAULT_ROLE_LEVELS;
    this.userLevels = options.userLevels ?? {};
    this.extraAliases = options.aliases ?? [];
    this.registry = new CommandRegistry<CommandContext>({
      grammar: new CommandGrammar({
        prefixes: options.prefixes,
        enableMentions: options.enableMentions,
      }),
      translate: this.translator.translate,
      autoHelp: options.autoHelp,
    });
    this.dispatcher = new Dispatcher<CommandContext>({
      registry: this.registry,
      translate: this.translator.translate,
      logger: this.logger,
      bus: options.bus,
      bot: options.name,
    });
  }

  /** The bot's own user id; null until postInit() ran. */
  get userId(): number | null {
    return this._userId;
  }

  /** Shorthand for the bot's translator. */
  t(key: string, params?: Record<string, string | number>): string {
    return this.translator.translate(key, params);
  }

  /** Override to register commands. Runs once, from postInit(). */
  protected registerCommands(): void {}

  abstract onMessage(message: Message): Promise<void>;

  async onStart(): Promise<void> {}

  async onStop(): Promise<void> {}

  /**
   * Register commands, learn who we are, derive mention aliases from the
   * profile and mark the account active.
   */
  async postInit(): Promise<void> {
    if (!this.commandsRegistered) {
      this.registerCommands();
      this.commandsRegistered = true;
    }

    this.logger.debug({}, 'Fetching bot profile for mention aliases');
    const profile = await this.client.getProfile();
    this._userId = profile.user_id;
    this.registry.grammar.addIdentityAliases({
      fullName: profile.full_name,
      email: profile.email,
      extra: this.extraAliases,
    });
    this.logger.info({ userId: profile.user_id }, 'Bot profile loaded');

    await this.client.updatePresence('active');
    this.logger.info({}, 'Presence set to active');
  }

  async onEvent(event: ChatEvent): Promise<void> {
    const message = event.message;
    if (event.type !== 'message' || !message) return;
    if (message.sender_id === this._userId) {
      this.logger.debug({ messageId: message.id }, 'Ignoring own message');
      return;
    }

    const permission = await this.permissionFor(message);
    const outcome = await this.dispatcher.handle(message.content, permission, {
      bot: this,
      message,
    });
    await this.respond(message, outcome);
  }

  /** Answer on the same stream and topic, or privately to the same people. */
  async sendReply(original: Message, content: string): Promise<number> {
    if (original.type === 'private') {
      const recipients = Array.isArray(original.display_recipient)
        ? original.display_recipient.map((r) => r.id)
        : [];
      return this.client.sendMessage({
        type: 'private',
        to: recipients.length > 0 ? recipients : [original.sender_id],
        content,
      });
    }
    if (original.stream_id === undefined || original.stream_id === null) {
      throw new Error(`Stream message ${original.id} has no stream_id`);
    }
    return this.client.sendMessage({
      type: 'stream',
      to: original.stream_id,
      topic: original.topic ?? original.subject ?? 'general',
      content,
    });
  }

  /** Caller level from the per-user override or the sender's role. */
  protected async permissionFor(message: Message): Promise<PermissionContext> {
    const override = this.userLevels[message.sender_email];
    if (override !== undefined) {
      return resolvePermissionContext(undefined, this.roleLevels, override);
    }
    return resolvePermissionContext(await this.roleOf(message.sender_id), this.roleLevels);
  }

  private async roleOf(userId: number): Promise<string | undefined> {
    if (this.roleCache.has(userId)) return this.roleCache.get(userId);
    try {
      const user = await this.client.getUser(userId);
      const role = roleNameFromCode(user.role);
      this.roleCache.set(userId, role);
      return role;
    } catch (err) {
      this.logger.warn({ userId, err: formatError(err) }, 'Could not look up sender role');
      return undefined;
    }
  }

  private async respond(message: Message, outcome: DispatchOutcome): Promise<void> {
    switch (outcome.status) {
      case 'not-command':
        await this.onMessage(message);
        return;
      case 'handled':
        if (outcome.reply !== undefined) await this.sendReply(message, outcome.reply);
        return;
      default:
        await this.sendReply(message, outcome.reply);
    }
  }
}
