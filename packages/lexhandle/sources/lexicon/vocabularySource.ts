import { GenerationError } from "../generate/generationError.js";
import { randomIntBelow } from "../random/randomIntBelow.js";
import type { LanguageTag, LexiconEntry, RandomSource } from "../types.js";
import type { LexiconDataset } from "./lexiconDataset.js";

export type VocabularySourceOptions = {
    random?: RandomSource;
};

/**
 * Samples raw words from a preloaded dataset.
 * Repeats are allowed; deduplication belongs to the caller.
 */
export class VocabularySource {
    private readonly dataset: LexiconDataset;
    private readonly random: RandomSource;

    constructor(dataset: LexiconDataset, options: VocabularySourceOptions = {}) {
        this.dataset = dataset;
        this.random = options.random ?? Math.random;
    }

    isReady(language: LanguageTag): boolean {
        return this.dataset.isReady(language);
    }

    /**
     * Draws one word uniformly from the language's list.
     * Throws: GenerationError resource_unavailable when the language has no list.
     */
    sample(language: LanguageTag, random: RandomSource = this.random): LexiconEntry {
        const words = this.dataset.words(language);
        if (words.length === 0) {
            throw new GenerationError("resource_unavailable", `Word list is not loaded for ${language}`, {
                language,
                details: this.dataset.source(language) ?? "no source"
            });
        }
        const word = words[randomIntBelow(random, words.length)];
        if (word === undefined) {
            throw new Error(`Sampled index out of range for ${language}`);
        }
        return { language, word };
    }
}
