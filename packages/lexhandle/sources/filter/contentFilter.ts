import { wordFilterNormalize, wordFilterVariants } from "./wordFilterVariants.js";

/**
 * Read-only denylist check for candidate words.
 * Expects: words are denylist entries in any case; empty entries are ignored.
 */
export class ContentFilter {
    private readonly words: ReadonlySet<string>;

    constructor(words: Iterable<string>) {
        const normalized = new Set<string>();
        for (const word of words) {
            const value = wordFilterNormalize(word);
            if (value.length > 0) {
                normalized.add(value);
            }
        }
        this.words = normalized;
    }

    get size(): number {
        return this.words.size;
    }

    /**
     * Returns false when the word or any of its parts is denylisted.
     * Matching ignores case, diacritics and common leetspeak digits.
     */
    isClean(word: string): boolean {
        for (const variant of wordFilterVariants(word)) {
            if (this.words.has(variant)) {
                return false;
            }
        }
        return true;
    }
}
