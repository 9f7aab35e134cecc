/**
 * Internationalization (i18n) Module
 *
 * Every user-facing string of the runtime goes through a Translator. Lookup is
 * two-tier: the bot's own table first, then the shared locale table loaded
 * from JSON, then the key itself.
 */
import { createRequire } from 'module';
import { z } from 'zod';

import { type Language, type TranslationParams, logger } from '@relaybot/core';

export type { Language } from '@relaybot/core';
export {
  SUPPORTED_LANGUAGES,
  LANGUAGE_LABELS,
  detectLanguage,
} from '@relaybot/core';

// ============================================================================
// Types
// ============================================================================

export type TranslationRecord = Record<string, string>;

/** Per-language tables a bot ships for its own replies. */
export type TranslationTables = Partial<Record<Language, TranslationRecord>>;

export type Translate = (key: string, params?: TranslationParams) => string;

// ============================================================================
// Locale loading
// ============================================================================

const _require = createRequire(import.meta.url);
const translationRecordSchema = z.record(z.string());

function loadLocale(lang: Language): TranslationRecord {
  try {
    return translationRecordSchema.parse(_require(`./locales/${lang}.json`));
  } catch (err) {
    logger.warn({ lang, err }, 'Locale file unusable, falling back to English');
    return translationRecordSchema.parse(_require('./locales/en.json'));
  }
}

const localeCache: Partial<Record<Language, TranslationRecord>> = {};

function getLocale(lang: Language): TranslationRecord {
  const cached = localeCache[lang];
  if (cached) return cached;
  const loaded = loadLocale(lang);
  localeCache[lang] = loaded;
  return loaded;
}

// ============================================================================
// Interpolation
// ============================================================================

/**
 * Replace {key} placeholders in a template string with values from params.
 */
export function interpolate(template: string, params: TranslationParams): string {
  return template.replace(/\{(\w+)\}/g, (_, key: string) => {
    const val = params[key];
    return val !== undefined ? String(val) : `{${key}}`;
  });
}

// ============================================================================
// Translator
// ============================================================================

export class Translator {
  readonly language: Language;
  private readonly own: TranslationRecord;

  constructor(language: Language, tables: TranslationTables = {}) {
    this.language = language;
    this.own = tables[language] ?? tables.en ?? {};
  }

  /** Bound so it can be handed around as a plain function. */
  readonly translate: Translate = (key, params) => {
    const template = this.own[key] ?? getLocale(this.language)[key] ?? key;
    return params ? interpolate(template, params) : template;
  };

  has(key: string): boolean {
    return key in this.own || key in getLocale(this.language);
  }
}

// ============================================================================
// Process default
// ============================================================================

let currentLanguage: Language = 'en';

export function setLanguage(lang: Language): void {
  currentLanguage = lang;
}

/** Language for bots whose options name none. */
export function getLanguage(): Language {
  return currentLanguage;
}
