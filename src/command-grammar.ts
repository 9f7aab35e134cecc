/**
 * CommandGrammar - decides whether text is addressed to the bot and turns the
 * remainder into tokens and coerced argument values.
 */
import {
  CommandInvalidValueError,
  CommandMissingArgumentError,
  CommandTooManyArgumentsError,
} from '@relaybot/core';

import type {
  ArgumentKind,
  ArgumentValue,
  CommandArgument,
  ScalarValue,
} from './command-types.js';

export interface GrammarOptions {
  prefixes?: readonly string[];
  enableMentions?: boolean;
  mentionAliases?: readonly string[];
}

export interface IdentityAliases {
  fullName?: string;
  email?: string;
  extra?: readonly string[];
}

const TRUTHY = new Set(['true', '1', 'yes', 'y', 'on']);
const FALSY = new Set(['false', '0', 'no', 'n', 'off']);
const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const MENTION_SEPARATORS = /^[\s:,-]*/;

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/** Coerce one token, or return undefined when it is not a valid `kind` literal. */
export function coerceToken(token: string, kind: ArgumentKind): ScalarValue | undefined {
  switch (kind) {
    case 'string':
      return token;
    case 'int': {
      if (!INT_PATTERN.test(token)) return undefined;
      const value = Number.parseInt(token, 10);
      return Number.isSafeInteger(value) ? value : undefined;
    }
    case 'float': {
      if (!FLOAT_PATTERN.test(token)) return undefined;
      const value = Number(token);
      return Number.isFinite(value) ? value : undefined;
    }
    case 'bool': {
      const lowered = token.toLowerCase();
      if (TRUTHY.has(lowered)) return true;
      if (FALSY.has(lowered)) return false;
      return undefined;
    }
  }
}

function boundaryAfter(text: string, index: number): boolean {
  if (index >= text.length) return true;
  const next = text[index];
  return /\s/.test(next) || next === ':' || next === ',' || next === '-';
}

export class CommandGrammar {
  readonly prefixes: readonly string[];
  readonly enableMentions: boolean;
  private aliases: string[] = [];

  constructor(options: GrammarOptions = {}) {
    this.prefixes = [...(options.prefixes ?? ['/', '!'])]
      .filter((p) => p.length > 0)
      .sort((a, b) => b.length - a.length);
    this.enableMentions = options.enableMentions ?? true;
    this.addMentionAliases(options.mentionAliases ?? []);
  }

  get mentionAliases(): readonly string[] {
    return this.aliases;
  }

  /** The prefix shown in help text. */
  get primaryPrefix(): string {
    return this.prefixes.find((p) => p.length === 1) ?? this.prefixes[0] ?? '';
  }

  addMentionAliases(aliases: readonly string[]): void {
    for (const alias of aliases) {
      if (alias.length > 0 && !this.aliases.includes(alias)) this.aliases.push(alias);
    }
    // Longest first, so `@**Ada Bot**` wins over `@Ada`
    this.aliases.sort((a, b) => b.length - a.length);
  }

  /** Aliases a user may type to address the bot by its profile. */
  addIdentityAliases({ fullName, email, extra }: IdentityAliases): void {
    const derived: string[] = [];
    if (fullName) derived.push(`@**${fullName}**`, `@${fullName}`);
    if (email) derived.push(`@${email}`);
    this.addMentionAliases([...derived, ...(extra ?? [])]);
  }

  /**
   * The command text after a prefix or mention, trimmed.
   * Undefined when the text does not address the bot.
   */
  stripTrigger(text: string): string | undefined {
    const trimmed = text.trim();
    if (trimmed.length === 0) return undefined;

    for (const prefix of this.prefixes) {
      if (trimmed.startsWith(prefix)) return trimmed.slice(prefix.length).trim();
    }

    if (!this.enableMentions) return undefined;
    for (const alias of this.aliases) {
      if (trimmed.startsWith(alias) && boundaryAfter(trimmed, alias.length)) {
        return trimmed.slice(alias.length).replace(MENTION_SEPARATORS, '').trim();
      }
    }
    return undefined;
  }

  /**
   * Bind argument tokens to declared arguments.
   * Optional arguments without a token become null; a `multiple` argument
   * takes every remaining token, possibly none.
   */
  bindArguments(
    command: string,
    declared: readonly CommandArgument[],
    allowExtra: boolean,
    tokens: readonly string[],
  ): Record<string, ArgumentValue> {
    const bound: Record<string, ArgumentValue> = {};
    let index = 0;
    let consumedAll = false;

    for (const arg of declared) {
      if (arg.multiple) {
        bound[arg.name] = tokens.slice(index).map((token) => this.coerce(command, arg, token));
        index = tokens.length;
        consumedAll = true;
        break;
      }
      if (index >= tokens.length) {
        if (arg.required) throw new CommandMissingArgumentError(command, arg.name);
        bound[arg.name] = null;
        continue;
      }
      bound[arg.name] = this.coerce(command, arg, tokens[index]);
      index++;
    }

    if (!consumedAll && !allowExtra && index < tokens.length) {
      throw new CommandTooManyArgumentsError(command, declared.length, tokens.length);
    }
    return bound;
  }

  private coerce(command: string, arg: CommandArgument, token: string): ScalarValue {
    const value = coerceToken(token, arg.kind);
    if (value === undefined) {
      throw new CommandInvalidValueError(command, arg.name, token, arg.kind);
    }
    return value;
  }
}
