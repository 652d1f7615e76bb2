import { adjectives, nouns } from "unique-username-generator";

export const LEXICON_BUILTIN_ENGLISH_SOURCE = "unique-username-generator";

/**
 * English fallback word list: the noun and adjective dictionaries shipped
 * with unique-username-generator, de-duplicated.
 */
export function lexiconBuiltinEnglish(): string[] {
    return [...new Set([...nouns, ...adjectives].map((word) => word.trim()).filter((word) => word.length > 0))];
}
