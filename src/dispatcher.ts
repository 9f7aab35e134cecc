/**
 * Dispatcher - turns raw text into at most one handler call.
 *
 * Order matters: the permission gate runs on the cheap name lookup, before
 * arguments are parsed, so an under-privileged caller always gets
 * permission-denied and never an argument error. Nothing thrown by parsing
 * or by a handler escapes handle().
 */
import {
  CommandError,
  CommandInvalidValueError,
  CommandUnknownError,
  PermissionDeniedError,
  formatError,
  logger as defaultLogger,
  type Logger,
} from '@relaybot/core';
import type { EventBus } from '@relaybot/event-bus';

import type { CommandRegistry } from './command-registry.js';
import type { CommandInvocation, CommandSpec, PermissionContext } from './command-types.js';
import type { Translate } from './i18n/index.js';

export type DispatchOutcome =
  | { status: 'not-command' }
  | { status: 'handled'; command: string; reply?: string }
  | { status: 'unknown-command'; command: string; reply: string }
  | {
      status: 'permission-denied';
      command: string;
      requiredLevel: number;
      callerLevel: number;
      reply: string;
    }
  | { status: 'invalid-arguments'; command: string; error: CommandError; reply: string }
  | { status: 'failed'; command: string; error: unknown; reply: string };

export type DispatchStatus = DispatchOutcome['status'];

/** Calls the handler. The default one calls `spec.handler` directly. */
export type HandlerInvoker<C> = (
  spec: CommandSpec<C>,
  invocation: CommandInvocation<C>,
  context: C,
  caller: PermissionContext,
) => Promise<string | void>;

export interface DispatcherOptions<C> {
  registry: CommandRegistry<C>;
  translate: Translate;
  logger?: Logger;
  bus?: EventBus;
  bot?: string;
}

/**
 * Map a role name to a caller level. `userLevel` (a per-user override from
 * the manifest) wins; unknown roles get level 0.
 */
export function resolvePermissionContext(
  roleName: string | undefined,
  roleLevels: Readonly<Record<string, number>>,
  userLevel?: number,
): PermissionContext {
  const fromRole = roleName !== undefined ? roleLevels[roleName] : undefined;
  return {
    callerLevel: userLevel ?? fromRole ?? 0,
    roleLevels,
  };
}

const invokeDirectly = async <C>(
  spec: CommandSpec<C>,
  invocation: CommandInvocation<C>,
  context: C,
  caller: PermissionContext,
): Promise<string | void> => spec.handler(invocation, context, caller);

export class Dispatcher<C> {
  private readonly registry: CommandRegistry<C>;
  private readonly translate: Translate;
  private readonly logger: Logger;
  private readonly bus?: EventBus;
  private readonly bot: string;

  constructor(options: DispatcherOptions<C>) {
    this.registry = options.registry;
    this.translate = options.translate;
    this.logger = options.logger ?? defaultLogger;
    this.bus = options.bus;
    this.bot = options.bot ?? 'SYSTEM';
  }

  async handle(
    rawText: string,
    permission: PermissionContext,
    context: C,
    invoke: HandlerInvoker<C> = invokeDirectly,
  ): Promise<DispatchOutcome> {
    const outcome = await this.resolve(rawText, permission, context, invoke);
    if (outcome.status !== 'not-command') {
      this.bus?.emit('command:dispatched', {
        bot: this.bot,
        command: outcome.command,
        status: outcome.status,
      });
    }
    return outcome;
  }

  private async resolve(
    rawText: string,
    permission: PermissionContext,
    context: C,
    invoke: HandlerInvoker<C>,
  ): Promise<DispatchOutcome> {
    const body = this.registry.grammar.stripTrigger(rawText);
    if (body === undefined || body.length === 0) return { status: 'not-command' };

    const spec = this.registry.findCommandSpec(rawText);
    if (!spec) {
      const [typed] = body.split(/\s+/, 1);
      const error = new CommandUnknownError(typed);
      return { status: 'unknown-command', command: typed, reply: this.reply(error) };
    }

    if (spec.minLevel !== undefined && permission.callerLevel < spec.minLevel) {
      const error = new PermissionDeniedError(spec.name, spec.minLevel, permission.callerLevel);
      this.logger.info(
        { command: spec.name, required: spec.minLevel, level: permission.callerLevel },
        'Command refused: caller level too low',
      );
      return {
        status: 'permission-denied',
        command: spec.name,
        requiredLevel: spec.minLevel,
        callerLevel: permission.callerLevel,
        reply: this.reply(error),
      };
    }

    let invocation: CommandInvocation<C>;
    try {
      invocation = this.registry.parseText(rawText);
    } catch (err) {
      if (err instanceof CommandError) {
        this.logger.debug({ command: spec.name, err: err.message }, 'Command arguments rejected');
        return { status: 'invalid-arguments', command: spec.name, error: err, reply: this.reply(err) };
      }
      return this.failed(spec.name, err);
    }

    try {
      const result = await invoke(spec, invocation, context, permission);
      return typeof result === 'string'
        ? { status: 'handled', command: spec.name, reply: result }
        : { status: 'handled', command: spec.name };
    } catch (err) {
      return this.failed(spec.name, err);
    }
  }

  private failed(command: string, err: unknown): DispatchOutcome {
    this.logger.error({ command, err: formatError(err) }, 'Command handler failed');
    return {
      status: 'failed',
      command,
      error: err,
      reply: this.translate('command.failed', { command }),
    };
  }

  private reply(error: CommandError): string {
    if (error instanceof CommandInvalidValueError) {
      return this.translate(error.key, { ...error.params, kind: this.translate(`kind.${error.kind}`) });
    }
    return this.translate(error.key, error.params);
  }
}
