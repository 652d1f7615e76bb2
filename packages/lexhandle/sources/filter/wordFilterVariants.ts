const LEET_MAP: Record<string, string> = {
    "0": "o",
    "1": "i",
    "3": "e",
    "4": "a",
    "5": "s",
    "7": "t",
    "@": "a",
    $: "s"
};

/**
 * Folds a denylist entry or candidate to its comparable form.
 * Returns: lowercase, diacritics removed, everything but letters, digits, @ and $ dropped.
 */
export function wordFilterNormalize(value: string): string {
    return value
        .normalize("NFKD")
        .replace(/\p{M}+/gu, "")
        .toLowerCase()
        .replace(/[^\p{L}\p{N}@$]+/gu, "");
}

function leetFold(value: string): string {
    return value.replace(/[013457@$]/g, (char) => LEET_MAP[char] ?? char);
}

/**
 * Expands a candidate into every form checked against the denylist:
 * the joined word, each separator-delimited part, and leetspeak folds of both.
 */
export function wordFilterVariants(word: string): Set<string> {
    const parts = word
        .normalize("NFKD")
        .replace(/\p{M}+/gu, "")
        .toLowerCase()
        .split(/[^\p{L}\p{N}@$]+/u)
        .filter((part) => part.length > 0);
    const variants = new Set<string>();
    for (const value of [parts.join(""), ...parts]) {
        if (value.length === 0) {
            continue;
        }
        variants.add(value);
        variants.add(leetFold(value));
    }
    return variants;
}
