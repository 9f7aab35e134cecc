/**
 * Bot manifest (bots.json): which bots to run and how to reach their accounts.
 */
import fs from 'fs';
import { z } from 'zod';

import { isLanguage, type Language } from '@relaybot/core';
import { logger } from '@relaybot/core/logger';

const languageSchema = z.custom<Language>(
  (value) => typeof value === 'string' && isLanguage(value),
  { message: 'Unsupported language' },
);

export const botEntrySchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9_-]+$/, 'Use letters, digits, "_" or "-"'),
  /** Directory under the bots dir, or a path relative to it. */
  module: z.string().min(1),
  enabled: z.boolean().default(true),
  site: z.string().url(),
  email: z.string().email(),
  /** Name of the environment variable holding the API key. */
  apiKeyEnv: z.string().min(1),
  eventTypes: z.array(z.string().min(1)).default(['message']),
  narrow: z.array(z.array(z.string())).default([]),
  prefixes: z.array(z.string().min(1)).optional(),
  enableMentions: z.boolean().optional(),
  aliases: z.array(z.string().min(1)).default([]),
  language: languageSchema.optional(),
  roleLevels: z.record(z.number().int()).optional(),
  userLevels: z.record(z.number().int()).default({}),
  config: z.record(z.unknown()).default({}),
});

export const botManifestSchema = z
  .object({
    bots: z.array(botEntrySchema),
  })
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.bots.forEach((bot, index) => {
      if (seen.has(bot.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bots', index, 'name'],
          message: `Duplicate bot name: ${bot.name}`,
        });
      }
      seen.add(bot.name);
    });
  });

export type BotEntry = z.infer<typeof botEntrySchema>;
export type BotManifest = z.infer<typeof botManifestSchema>;

export class ManifestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ManifestError';
  }
}

export function parseBotManifest(raw: unknown): BotManifest {
  const parsed = botManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ManifestError(`Invalid bot manifest: ${details}`);
  }
  return parsed.data;
}

export function loadBotManifest(manifestPath: string): BotManifest {
  if (!fs.existsSync(manifestPath)) {
    throw new ManifestError(`Bot manifest not found: ${manifestPath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
  } catch (err) {
    throw new ManifestError(`Failed to read bot manifest ${manifestPath}`, { cause: err });
  }
  const manifest = parseBotManifest(raw);
  logger.info(
    { manifestPath, bots: manifest.bots.length, enabled: manifest.bots.filter((b) => b.enabled).length },
    'Bot manifest loaded',
  );
  return manifest;
}
