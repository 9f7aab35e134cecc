/**
 * CommandRegistry - holds command specs, resolves names and aliases, parses
 * invocations and renders help.
 *
 * findCommandSpec() is the cheap path: trigger detection plus a map lookup,
 * no argument is looked at and nothing throws. parseText() does the full
 * parse and throws the CommandError family.
 */
import { CommandRegistrationError, CommandUnknownError } from '@relaybot/core';

import { CommandGrammar, tokenize } from './command-grammar.js';
import {
  argument,
  defineCommand,
  stringArg,
  type CommandArgument,
  type CommandDefinition,
  type CommandInvocation,
  type CommandSpec,
  type PermissionContext,
} from './command-types.js';
import type { Translate } from './i18n/index.js';

export interface CommandRegistryOptions {
  grammar?: CommandGrammar;
  translate: Translate;
  /** Register the built-in `help` command (alias `?`). Default true. */
  autoHelp?: boolean;
}

export class CommandRegistry<C> {
  readonly grammar: CommandGrammar;
  private readonly translate: Translate;
  private readonly specs = new Map<string, CommandSpec<C>>();
  private readonly aliasIndex = new Map<string, string>();

  constructor(options: CommandRegistryOptions) {
    this.grammar = options.grammar ?? new CommandGrammar();
    this.translate = options.translate;
    if (options.autoHelp ?? true) {
      this.register({
        name: 'help',
        description: this.translate('help.description'),
        aliases: ['?'],
        args: [
          argument('command', 'string', {
            required: false,
            description: this.translate('help.argument.command'),
          }),
        ],
        handler: (invocation, _context, caller) => this.handleHelp(invocation, caller),
      });
    }
  }

  register(definition: CommandDefinition<C> | CommandSpec<C>): CommandSpec<C> {
    const spec = defineCommand(definition);
    const name = spec.name.toLowerCase();
    if (name.length === 0 || /\s/.test(name)) {
      throw new CommandRegistrationError(`Invalid command name: "${spec.name}"`);
    }
    validateArguments(spec.name, spec.args);

    const aliases = spec.aliases.map((alias) => alias.toLowerCase());
    for (const key of [name, ...aliases]) {
      if (this.specs.has(key) || this.aliasIndex.has(key)) {
        throw new CommandRegistrationError(`Command name or alias already registered: ${key}`);
      }
    }
    if (new Set(aliases).size !== aliases.length || aliases.includes(name)) {
      throw new CommandRegistrationError(`Duplicate alias on command ${spec.name}`);
    }

    this.specs.set(name, spec);
    for (const alias of aliases) this.aliasIndex.set(alias, name);
    return spec;
  }

  /** Look up by name or alias, case-insensitively. */
  get(nameOrAlias: string): CommandSpec<C> | undefined {
    const key = nameOrAlias.toLowerCase();
    return this.specs.get(this.aliasIndex.get(key) ?? key);
  }

  list(): CommandSpec<C>[] {
    return [...this.specs.values()];
  }

  findCommandSpec(text: string): CommandSpec<C> | undefined {
    const body = this.grammar.stripTrigger(text);
    if (body === undefined) return undefined;
    const [first] = body.split(/\s+/, 1);
    if (!first) return undefined;
    return this.get(first);
  }

  /**
   * Full parse. Text that carries no trigger is parsed as a bare command,
   * e.g. `add 1 2`.
   */
  parseText(text: string): CommandInvocation<C> {
    const body = this.grammar.stripTrigger(text) ?? text.trim();
    const tokens = tokenize(body);
    if (tokens.length === 0) throw new CommandUnknownError('');

    const spec = this.get(tokens[0]);
    if (!spec) throw new CommandUnknownError(tokens[0]);

    const args = this.grammar.bindArguments(spec.name, spec.args, spec.allowExtra, tokens.slice(1));
    return Object.freeze({
      name: spec.name,
      args: Object.freeze(args),
      tokens: Object.freeze(tokens),
      spec,
    });
  }

  // ==========================================================================
  // Help
  // ==========================================================================

  /**
   * One line per visible command. With `callerLevel`, commands whose
   * minimum level is above it are left out.
   */
  generateHelp(callerLevel?: number): string {
    const lines = this.list()
      .filter((spec) => spec.showInHelp)
      .filter((spec) => callerLevel === undefined || (spec.minLevel ?? 0) <= callerLevel)
      .map((spec) => {
        const usage = this.usage(spec);
        return spec.description ? `${usage} - ${spec.description}` : usage;
      });
    if (lines.length === 0) return this.translate('help.empty');
    return [this.translate('help.title'), ...lines].join('\n');
  }

  describeCommand(nameOrAlias: string): string | undefined {
    const spec = this.get(nameOrAlias);
    if (!spec) return undefined;

    const lines = [this.usage(spec)];
    if (spec.description) lines.push(spec.description);
    if (spec.aliases.length > 0) {
      lines.push(this.translate('help.aliases', { aliases: spec.aliases.join(', ') }));
    }
    if (spec.args.length === 0) {
      lines.push(this.translate('help.noArguments'));
    } else {
      lines.push(this.translate('help.arguments'));
      for (const arg of spec.args) lines.push(`  ${this.describeArgument(arg)}`);
    }
    if (spec.minLevel !== undefined) {
      lines.push(this.translate('help.minLevel', { level: spec.minLevel }));
    }
    return lines.join('\n');
  }

  private usage(spec: CommandSpec<C>): string {
    const parts = [`${this.grammar.primaryPrefix}${spec.name}`];
    for (const arg of spec.args) {
      const label = arg.multiple ? `${arg.name}...` : arg.name;
      parts.push(arg.required ? `<${label}>` : `[${label}]`);
    }
    return parts.join(' ');
  }

  private describeArgument(arg: CommandArgument): string {
    const flags = [
      this.translate(arg.required ? 'argument.required' : 'argument.optional'),
      this.translate(`kind.${arg.kind}`),
    ];
    if (arg.multiple) flags.push(this.translate('argument.multiple'));
    const head = `${arg.name} (${flags.join(', ')})`;
    return arg.description ? `${head}: ${arg.description}` : head;
  }

  private handleHelp(invocation: CommandInvocation<C>, caller: PermissionContext): string {
    const target = stringArg(invocation, 'command');
    if (target === undefined) return this.generateHelp(caller.callerLevel);
    const spec = this.get(target);
    if (!spec || (spec.minLevel ?? 0) > caller.callerLevel) {
      return this.translate('command.unknown', { command: target });
    }
    return this.describeCommand(target) ?? this.translate('command.unknown', { command: target });
  }
}

function validateArguments(command: string, args: readonly CommandArgument[]): void {
  const names = new Set<string>();
  args.forEach((arg, index) => {
    if (names.has(arg.name)) {
      throw new CommandRegistrationError(`Duplicate argument ${arg.name} on command ${command}`);
    }
    names.add(arg.name);
    if (arg.multiple && index !== args.length - 1) {
      throw new CommandRegistrationError(
        `Argument ${arg.name} on command ${command} takes multiple values and must be last`,
      );
    }
  });
}
