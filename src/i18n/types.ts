// Translation namespace types for type-safe i18n

// Supported languages
export type SupportedLanguage = 'en' | 'ko';

export const SUPPORTED_LANGUAGES: readonly SupportedLanguage[] = ['en', 'ko'];

// Available translation namespaces
export type TranslationNamespace = 'errors' | 'cli';

/**
 * Recursively generates dot-notation paths for nested objects.
 *
 * @example
 * ```typescript
 * type Keys = NestedKeyOf<{ a: { b: string; c: { d: string } } }>
 * // Result: "a" | "a.b" | "a.c" | "a.c.d"
 * ```
 */
export type NestedKeyOf<T> = T extends object
  ? {
      [K in keyof T & string]: T[K] extends object
        ? K | `${K}.${NestedKeyOf<T[K]>}`
        : K;
    }[keyof T & string]
  : never;

export function isSupportedLanguage(value: string): value is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}
