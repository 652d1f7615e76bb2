import type { ContentFilter } from "../filter/contentFilter.js";
import { wordAsciiReduce } from "../format/wordAsciiReduce.js";

/**
 * Counts the distinct username bases a word list can produce.
 * Expects: the same ASCII reduction, length and denylist rules as generation.
 */
export function lexiconUsableCount(words: readonly string[], filter: ContentFilter, minWordLength: number): number {
    const bases = new Set<string>();
    for (const word of words) {
        const reduced = wordAsciiReduce(word);
        if (reduced === null || reduced.length < minWordLength) {
            continue;
        }
        const base = reduced.toLowerCase();
        if (filter.isClean(base) && filter.isClean(word)) {
            bases.add(base);
        }
    }
    return bases.size;
}
