/**
 * Shapes shared by the command grammar, registry and dispatcher.
 */

export type ArgumentKind = 'string' | 'int' | 'float' | 'bool';

export type ScalarValue = string | number | boolean;

/** A coerced argument: scalar, list (multiple) or null (optional, absent). */
export type ArgumentValue = ScalarValue | ScalarValue[] | null;

export interface CommandArgument {
  name: string;
  kind: ArgumentKind;
  required: boolean;
  /** Consumes every remaining token. Only allowed on the last argument. */
  multiple: boolean;
  description: string;
}

/** Who is calling. Built per dispatch from the sender's role. */
export interface PermissionContext {
  callerLevel: number;
  roleLevels: Readonly<Record<string, number>>;
}

/** A handler may return reply text; the bot sends it back to the sender. */
export type CommandHandler<C> = (
  invocation: CommandInvocation<C>,
  context: C,
  caller: PermissionContext,
) => string | void | Promise<string | void>;

export interface CommandSpec<C = unknown> {
  name: string;
  description: string;
  aliases: readonly string[];
  args: readonly CommandArgument[];
  allowExtra: boolean;
  /** Lowest caller level allowed to run the command; unset means everyone. */
  minLevel?: number;
  showInHelp: boolean;
  handler: CommandHandler<C>;
}

export interface CommandInvocation<C = unknown> {
  readonly name: string;
  readonly args: Readonly<Record<string, ArgumentValue>>;
  /** Tokens after the trigger, command name first. */
  readonly tokens: readonly string[];
  readonly spec: CommandSpec<C>;
}

export interface CommandDefinition<C> {
  name: string;
  handler: CommandHandler<C>;
  description?: string;
  aliases?: readonly string[];
  args?: readonly CommandArgument[];
  allowExtra?: boolean;
  minLevel?: number;
  showInHelp?: boolean;
}

export function defineCommand<C>(definition: CommandDefinition<C>): CommandSpec<C> {
  return {
    name: definition.name,
    description: definition.description ?? '',
    aliases: definition.aliases ?? [],
    args: definition.args ?? [],
    allowExtra: definition.allowExtra ?? false,
    minLevel: definition.minLevel,
    showInHelp: definition.showInHelp ?? true,
    handler: definition.handler,
  };
}

export function argument(
  name: string,
  kind: ArgumentKind = 'string',
  options: { required?: boolean; multiple?: boolean; description?: string } = {},
): CommandArgument {
  return {
    name,
    kind,
    required: options.required ?? true,
    multiple: options.multiple ?? false,
    description: options.description ?? '',
  };
}

// ============================================================================
// Typed accessors for handlers
// ============================================================================

export function stringArg<C>(invocation: CommandInvocation<C>, name: string): string | undefined {
  const value = invocation.args[name];
  return typeof value === 'string' ? value : undefined;
}

export function numberArg<C>(invocation: CommandInvocation<C>, name: string): number | undefined {
  const value = invocation.args[name];
  return typeof value === 'number' ? value : undefined;
}

export function booleanArg<C>(invocation: CommandInvocation<C>, name: string): boolean | undefined {
  const value = invocation.args[name];
  return typeof value === 'boolean' ? value : undefined;
}

export function listArg<C>(invocation: CommandInvocation<C>, name: string): ScalarValue[] {
  const value = invocation.args[name];
  return Array.isArray(value) ? value : [];
}
