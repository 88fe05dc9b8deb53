/**
 * Dictionaries published as `<language>.dic.zip` by the Scrabble3D
 * Dictionaries project. The name selects which archive to load and is
 * otherwise opaque to the comparison.
 */
export const SUPPORTED_LANGUAGES = [
    'brazilian',
    'catalan',
    'deutsch',
    'english',
    'english_phonetic',
    'espanol',
    'francais',
    'greek',
    'hebrew',
    'hollands',
    'hungarian',
    'irish',
    'italiano',
    'latin',
    'persian',
    'polish',
    'portuguese',
    'romana',
    'russian',
    'scottishgaelic',
    'slovak',
    'suomi',
    'svenska',
    'tamil',
    'turkish',
] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

const LANGUAGE_SET: ReadonlySet<string> = new Set(SUPPORTED_LANGUAGES);

export function isSupportedLanguage(value: string): value is Language {
    return LANGUAGE_SET.has(value);
}
