import i18next from 'i18next';
import type { SupportedLanguage, TranslationNamespace, NestedKeyOf } from './types.js';
import { isSupportedLanguage, SUPPORTED_LANGUAGES } from './types.js';

export type { SupportedLanguage, TranslationNamespace, NestedKeyOf };
export { isSupportedLanguage, SUPPORTED_LANGUAGES };

import enErrors from './locales/en/errors.json';
import enCli from './locales/en/cli.json';
import koErrors from './locales/ko/errors.json';
import koCli from './locales/ko/cli.json';

// English is the source of truth for key types.
export type ErrorsJSON = typeof enErrors;
export type CliJSON = typeof enCli;

export type ErrorsKey = NestedKeyOf<ErrorsJSON>;
export type CliKey = NestedKeyOf<CliJSON>;

export async function initI18n(language: SupportedLanguage = 'en') {
  await i18next.init({
    lng: language,
    fallbackLng: 'en',
    ns: ['errors', 'cli'],
    defaultNS: 'cli',
    interpolation: { escapeValue: false },
    resources: {
      en: { errors: enErrors, cli: enCli },
      ko: { errors: koErrors, cli: koCli },
    },
  });
  return i18next;
}

/**
 * Translation function.
 *
 * Usage examples:
 *   t('errors:codes.network_error.minimal')
 *   t('cli:sync.synced', { branch: 'main', count: 3 })
 */
export const t = i18next.t.bind(i18next);

export function getCurrentLanguage(): SupportedLanguage {
  const language = i18next.language;
  return language && isSupportedLanguage(language) ? language : 'en';
}

export async function changeLanguage(language: SupportedLanguage): Promise<void> {
  await i18next.changeLanguage(language);
}
