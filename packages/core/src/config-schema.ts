import { z } from 'zod';

// ============================================================================
// Transform helpers
// ============================================================================

/**
 * Parse an env string as an integer, falling back to defaultValue.
 */
function envInt(defaultValue: number) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultValue;
      const parsed = parseInt(val, 10);
      return Number.isNaN(parsed) ? defaultValue : parsed;
    });
}

/**
 * Parse an env string as a boolean that defaults to true.
 * Only the string 'false' disables it.
 */
function envBoolDefaultTrue() {
  return z
    .string()
    .optional()
    .transform((val) => val !== 'false');
}

/**
 * Parse a comma-separated env string into a trimmed, non-empty list.
 */
function envList(defaultValue: string[]) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val.trim() === '') return defaultValue;
      return val
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    });
}

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // Paths
  RELAYBOT_MANIFEST: z.string().optional().default('bots.json'),
  RELAYBOT_STORE_DIR: z.string().optional().default('store'),
  RELAYBOT_BOTS_DIR: z.string().optional().default('bots'),

  // Language
  RELAYBOT_LANGUAGE: z.string().optional().default('en'),

  // Commands
  COMMAND_PREFIXES: envList(['/', '!']),
  MENTION_COMMANDS_ENABLED: envBoolDefaultTrue(),

  // Event polling
  POLL_TIMEOUT_MS: envInt(90000),
  POLL_MAX_ATTEMPTS: envInt(10),
  POLL_RETRY_ENABLED: envBoolDefaultTrue(),

  // Cache
  CACHE_FLUSH_INTERVAL_MS: envInt(5000),
  CACHE_MAX_RETRIES: envInt(5),
  CACHE_RETRY_DELAY_MS: envInt(100),

  // Logging
  LOG_LEVEL: z.string().optional(),
  NODE_ENV: z.string().optional(),
});

export type ParsedEnv = z.infer<typeof envSchema>;
