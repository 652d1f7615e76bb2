export const LANGUAGE_NAMES = {
    eng: "English",
    spa: "Spanish",
    fra: "French",
    ita: "Italian",
    por: "Portuguese",
    nld: "Dutch",
    pol: "Polish",
    swe: "Swedish",
    fin: "Finnish",
    nno: "Norwegian Nynorsk",
    nob: "Norwegian Bokmål",
    ron: "Romanian",
    slk: "Slovak",
    slv: "Slovenian",
    zsm: "Malay",
    eus: "Basque",
    cat: "Catalan",
    dan: "Danish",
    lit: "Lithuanian"
} as const;

export type LanguageTag = keyof typeof LANGUAGE_NAMES;

export const LANGUAGE_TAGS: readonly LanguageTag[] = [
    "eng",
    "spa",
    "fra",
    "ita",
    "por",
    "nld",
    "pol",
    "swe",
    "fin",
    "nno",
    "nob",
    "ron",
    "slk",
    "slv",
    "zsm",
    "eus",
    "cat",
    "dan",
    "lit"
];

export function languageTagIs(value: string): value is LanguageTag {
    return Object.prototype.hasOwnProperty.call(LANGUAGE_NAMES, value);
}

/**
 * Returns the English display name of a language tag.
 */
export function languageNameGet(tag: LanguageTag): string {
    return LANGUAGE_NAMES[tag];
}

/**
 * Parses a comma separated tag list such as "eng, fra,spa".
 * Expects: every entry is a supported tag; duplicates are dropped keeping first order.
 * Returns: tags in input order, or throws naming the first unknown tag.
 */
export function languageTagsParse(value: string): LanguageTag[] {
    const result: LanguageTag[] = [];
    const parts = value
        .split(",")
        .map((part) => part.trim().toLowerCase())
        .filter((part) => part.length > 0);
    for (const part of parts) {
        if (!languageTagIs(part)) {
            throw new Error(`Unknown language "${part}". Supported: ${LANGUAGE_TAGS.join(", ")}`);
        }
        if (!result.includes(part)) {
            result.push(part);
        }
    }
    if (result.length === 0) {
        throw new Error("At least one language is required");
    }
    return result;
}
