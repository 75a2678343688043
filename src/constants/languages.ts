export const AUTO_DETECT = 'auto';

export const FALLBACK_SOURCE_LANGUAGE = 'en';

export interface LanguageDefinition {
  code: string;
  name: string;
  displayName: string;
}

export const SUPPORTED_LANGUAGES: readonly LanguageDefinition[] = [
  { code: AUTO_DETECT, name: 'Auto Detect', displayName: 'Auto Detect' },
  { code: 'ko', name: 'Korean', displayName: '한국어' },
  { code: 'en', name: 'English', displayName: 'English' },
  { code: 'ja', name: 'Japanese', displayName: '日本語' },
  { code: 'zh', name: 'Chinese', displayName: '中文' },
  { code: 'es', name: 'Spanish', displayName: 'Español' },
  { code: 'fr', name: 'French', displayName: 'Français' },
  { code: 'de', name: 'German', displayName: 'Deutsch' },
  { code: 'ru', name: 'Russian', displayName: 'Русский' },
  { code: 'pt', name: 'Portuguese', displayName: 'Português' },
  { code: 'it', name: 'Italian', displayName: 'Italiano' },
];

export function findLanguage(code: string): LanguageDefinition | undefined {
  const normalized = code.trim().toLowerCase();
  return SUPPORTED_LANGUAGES.find((language) => language.code === normalized);
}

/** English name for prompts; unknown codes are passed through unchanged. */
export function describeLanguage(code: string): string {
  return findLanguage(code)?.name ?? code;
}
