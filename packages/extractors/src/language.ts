import type { Language } from '@orderflow/core';

const ARABIC_SCRIPT = /[\u0600-\u06FF]/;

/**
 * Arabic if any Arabic-script character appears, otherwise `fallback`
 */
export function detectLanguage(text: string, fallback: Language = 'en'): Language {
  return ARABIC_SCRIPT.test(text) ? 'ar' : fallback;
}
