export type Language = 'en' | 'zh-TW';

export const SUPPORTED_LANGUAGES: readonly Language[] = ['en', 'zh-TW'] as const;

export const LANGUAGE_LABELS: Record<Language, string> = {
  en: 'English',
  'zh-TW': '繁體中文',
};

export function isLanguage(value: string): value is Language {
  return SUPPORTED_LANGUAGES.some((lang) => lang === value);
}

/**
 * Map a locale string (e.g. from LANG) to the nearest supported Language.
 * Falls back to 'en' if no match is found.
 */
export function detectLanguage(locale: string): Language {
  const lang = locale.toLowerCase().replace('_', '-');

  if (lang.startsWith('zh-tw') || lang.startsWith('zh-hant')) return 'zh-TW';
  return 'en';
}
