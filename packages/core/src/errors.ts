/**
 * Error taxonomy shared by the transport, event loop, command engine and
 * cache layer.
 *
 * Network and store errors are retried or escalated below the dispatcher.
 * Command errors carry a translation key and parameters so the dispatcher can
 * turn them into a user-facing reply.
 */

export type RelaybotErrorCode =
  | 'NETWORK_TRANSIENT'
  | 'NETWORK_FATAL'
  | 'QUEUE_EXPIRED'
  | 'CHAT_API'
  | 'COMMAND_UNKNOWN'
  | 'COMMAND_MISSING_ARGUMENT'
  | 'COMMAND_TOO_MANY_ARGUMENTS'
  | 'COMMAND_INVALID_VALUE'
  | 'COMMAND_REGISTRATION'
  | 'PERMISSION_DENIED'
  | 'STORE_BUSY'
  | 'STORE_FATAL';

export class RelaybotError extends Error {
  readonly code: RelaybotErrorCode;

  constructor(code: RelaybotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'RelaybotError';
    this.code = code;
  }
}

// ============================================================================
// Network
// ============================================================================

export class NetworkTransientError extends RelaybotError {
  /** Server-requested wait before the next attempt, if any. */
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super('NETWORK_TRANSIENT', message, options);
    this.name = 'NetworkTransientError';
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class NetworkFatalError extends RelaybotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NETWORK_FATAL', message, options);
    this.name = 'NetworkFatalError';
  }
}

export class QueueExpiredError extends RelaybotError {
  readonly queueId: string;

  constructor(queueId: string, message = `Event queue ${queueId} expired`) {
    super('QUEUE_EXPIRED', message);
    this.name = 'QueueExpiredError';
    this.queueId = queueId;
  }
}

/** An `{"result": "error"}` answer from the chat service. */
export class ChatApiError extends RelaybotError {
  readonly apiCode: string;
  readonly status: number;

  constructor(apiCode: string, status: number, message: string) {
    super('CHAT_API', message);
    this.name = 'ChatApiError';
    this.apiCode = apiCode;
    this.status = status;
  }
}

// ============================================================================
// Commands
// ============================================================================

export type TranslationParams = Record<string, string | number>;

export class CommandError extends RelaybotError {
  /** Translation key of the user-facing message. */
  readonly key: string;
  readonly params: TranslationParams;

  constructor(
    code: RelaybotErrorCode,
    key: string,
    params: TranslationParams,
    message: string,
  ) {
    super(code, message);
    this.name = 'CommandError';
    this.key = key;
    this.params = params;
  }
}

export class CommandUnknownError extends CommandError {
  constructor(readonly command: string) {
    super('COMMAND_UNKNOWN', 'command.unknown', { command }, `Unknown command: ${command}`);
    this.name = 'CommandUnknownError';
  }
}

export class CommandMissingArgumentError extends CommandError {
  constructor(
    readonly command: string,
    readonly argument: string,
  ) {
    super(
      'COMMAND_MISSING_ARGUMENT',
      'command.missingArgument',
      { command, argument },
      `Missing argument: ${argument}`,
    );
    this.name = 'CommandMissingArgumentError';
  }
}

export class CommandTooManyArgumentsError extends CommandError {
  constructor(
    readonly command: string,
    readonly expected: number,
    readonly received: number,
  ) {
    super(
      'COMMAND_TOO_MANY_ARGUMENTS',
      'command.tooManyArguments',
      { command, expected, received },
      `Too many arguments: expected at most ${expected}, got ${received}`,
    );
    this.name = 'CommandTooManyArgumentsError';
  }
}

export class CommandInvalidValueError extends CommandError {
  constructor(
    readonly command: string,
    readonly argument: string,
    readonly value: string,
    readonly kind: string,
  ) {
    super(
      'COMMAND_INVALID_VALUE',
      'command.invalidValue',
      { command, argument, value, kind },
      `Invalid value for ${argument}: ${value}`,
    );
    this.name = 'CommandInvalidValueError';
  }
}

export class PermissionDeniedError extends CommandError {
  constructor(
    readonly command: string,
    readonly requiredLevel: number,
    readonly callerLevel: number,
  ) {
    super(
      'PERMISSION_DENIED',
      'command.permissionDenied',
      { command, required: requiredLevel, level: callerLevel },
      `Permission denied for ${command}: level ${callerLevel} < ${requiredLevel}`,
    );
    this.name = 'PermissionDeniedError';
  }
}

/** Programming error while building a registry; never shown to chat users. */
export class CommandRegistrationError extends RelaybotError {
  constructor(message: string) {
    super('COMMAND_REGISTRATION', message);
    this.name = 'CommandRegistrationError';
  }
}

// ============================================================================
// Store
// ============================================================================

export class StoreBusyError extends RelaybotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_BUSY', message, options);
    this.name = 'StoreBusyError';
  }
}

export class StoreFatalError extends RelaybotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_FATAL', message, options);
    this.name = 'StoreFatalError';
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
