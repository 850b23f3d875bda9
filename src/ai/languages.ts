/**
 * ISO language code to the display name used in prompts
 */
import languageTable from './languages.json' with { type: 'json' };

const LANGUAGE_NAMES: ReadonlyMap<string, string> = new Map(Object.entries(languageTable));

export const DEFAULT_LANGUAGE_CODE = 'en';
const DEFAULT_LANGUAGE_NAME = 'English';

/**
 * Unknown or empty codes fall back to English
 */
export function languageName(code: string | null | undefined): string {
    if (!code) return DEFAULT_LANGUAGE_NAME;
    return LANGUAGE_NAMES.get(code) ?? LANGUAGE_NAMES.get(code.toLowerCase()) ?? DEFAULT_LANGUAGE_NAME;
}
