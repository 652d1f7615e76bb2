import { LANGUAGE_TAGS } from "../languages/languageCatalog.js";
import type { LanguageTag } from "../types.js";

export type LexiconWordList = {
    words: readonly string[];
    source: string;
};

/**
 * Immutable, preloaded word lists keyed by language.
 * A language is ready when it holds at least one word.
 */
export class LexiconDataset {
    private readonly lists: ReadonlyMap<LanguageTag, LexiconWordList>;

    constructor(lists: Iterable<[LanguageTag, LexiconWordList]>) {
        const frozen = new Map<LanguageTag, LexiconWordList>();
        for (const [language, list] of lists) {
            frozen.set(language, Object.freeze({ words: Object.freeze([...list.words]), source: list.source }));
        }
        this.lists = frozen;
    }

    static fromWords(words: Partial<Record<LanguageTag, readonly string[]>>, source = "memory"): LexiconDataset {
        const lists: Array<[LanguageTag, LexiconWordList]> = [];
        for (const language of LANGUAGE_TAGS) {
            const list = words[language];
            if (list) {
                lists.push([language, { words: list, source }]);
            }
        }
        return new LexiconDataset(lists);
    }

    isReady(language: LanguageTag): boolean {
        return this.wordCount(language) > 0;
    }

    words(language: LanguageTag): readonly string[] {
        return this.lists.get(language)?.words ?? [];
    }

    wordCount(language: LanguageTag): number {
        return this.words(language).length;
    }

    source(language: LanguageTag): string | null {
        return this.lists.get(language)?.source ?? null;
    }

    readyLanguages(): LanguageTag[] {
        return [...this.lists.keys()].filter((language) => this.isReady(language));
    }
}
