import path from 'path';
import { envSchema, type ParsedEnv } from './config-schema.js';
import { detectLanguage, isLanguage, type Language } from './i18n-types.js';

// ============================================================================
// Config Types
// ============================================================================

export interface RetryPolicy {
  /** When false, the first transient failure is returned to the caller. */
  enabled: boolean;
  /** Total attempts per call, including the first one. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export interface CachePolicy {
  flushIntervalMs: number;
  retryDelayMs: number;
  /** Total persist attempts per entry and flush cycle. */
  maxRetries: number;
}

export interface CommandDefaults {
  prefixes: string[];
  enableMentions: boolean;
  autoHelp: boolean;
}

export interface RelaybotConfig {
  manifestPath: string;
  storeDir: string;
  botsDir: string;
  language: Language;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  cache: CachePolicy;
  commands: CommandDefaults;
  /** Role name -> permission level. Higher levels may run more commands. */
  roleLevels: Record<string, number>;
}

export const DEFAULT_ROLE_LEVELS: Readonly<Record<string, number>> = {
  owner: 100,
  admin: 80,
  moderator: 50,
  member: 10,
  guest: 1,
};

function resolveLanguage(value: string | undefined): Language {
  if (!value) return 'en';
  return isLanguage(value) ? value : detectLanguage(value);
}

// ============================================================================
// Factory: create config from env (never exits; the caller validates)
// ============================================================================

export function createConfig(
  overrides: Partial<RelaybotConfig> = {},
  source: NodeJS.ProcessEnv = process.env,
): RelaybotConfig {
  const PROJECT_ROOT = process.cwd();

  // Parse env vars through schema (provides type coercion and defaults)
  const parsed = envSchema.safeParse(source);
  const env: Partial<ParsedEnv> = parsed.success ? parsed.data : {};

  const defaults: RelaybotConfig = {
    manifestPath: path.resolve(PROJECT_ROOT, env.RELAYBOT_MANIFEST ?? 'bots.json'),
    storeDir: path.resolve(PROJECT_ROOT, env.RELAYBOT_STORE_DIR ?? 'store'),
    botsDir: path.resolve(PROJECT_ROOT, env.RELAYBOT_BOTS_DIR ?? 'bots'),
    language: resolveLanguage(env.RELAYBOT_LANGUAGE),
    requestTimeoutMs: env.POLL_TIMEOUT_MS ?? 90000,
    retry: {
      enabled: env.POLL_RETRY_ENABLED ?? true,
      maxAttempts: env.POLL_MAX_ATTEMPTS ?? 10,
      initialDelayMs: 1000,
      maxDelayMs: 60000,
      factor: 2,
    },
    cache: {
      flushIntervalMs: env.CACHE_FLUSH_INTERVAL_MS ?? 5000,
      retryDelayMs: env.CACHE_RETRY_DELAY_MS ?? 100,
      maxRetries: env.CACHE_MAX_RETRIES ?? 5,
    },
    commands: {
      prefixes: env.COMMAND_PREFIXES ?? ['/', '!'],
      enableMentions: env.MENTION_COMMANDS_ENABLED ?? true,
      autoHelp: true,
    },
    roleLevels: { ...DEFAULT_ROLE_LEVELS },
  };

  return { ...defaults, ...overrides };
}
