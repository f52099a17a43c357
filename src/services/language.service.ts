import { pmsConfig } from '../config/pms';
import languageTable from '../config/languages.json';

const LANGUAGES: ReadonlyMap<string, string> = new Map(Object.entries(languageTable));

/**
 * Map a guest's country code to the language we address them in.
 * Case-insensitive. Unknown or missing codes resolve to "None".
 */
export function resolveLanguage(countryCode: string | null | undefined): string {
  const code = countryCode?.trim().toLowerCase();
  if (!code) return pmsConfig.NO_LANGUAGE;
  return LANGUAGES.get(code) ?? pmsConfig.NO_LANGUAGE;
}

export type LanguageResolver = typeof resolveLanguage;
