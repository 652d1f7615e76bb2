import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import type { ContentFilter } from "../filter/contentFilter.js";
import { DEFAULT_MIN_WORD_LENGTH } from "../format/usernameFormat.js";
import type { VocabularySource } from "../lexicon/vocabularySource.js";
import type { GenerationRequest, LanguagePolicy, RandomSource, UnavailableLanguagePolicy } from "../types.js";
import type { GenerationListener, GenerationResult } from "./generationTypes.js";
import { UsernameGenerationRun } from "./usernameGenerationRun.js";

export const DEFAULT_MAX_ATTEMPTS_PER_SLOT = 200;
const DEFAULT_ASYNC_BATCH_SIZE = 64;

export type UsernameGeneratorOptions = {
    vocabulary: VocabularySource;
    filter: ContentFilter;
    random?: RandomSource;
    languagePolicy?: LanguagePolicy;
    maxAttemptsPerSlot?: number;
    minWordLength?: number;
    unavailableLanguages?: UnavailableLanguagePolicy;
};

export type GenerateOptions = {
    listener?: GenerationListener;
    isCancelled?: () => boolean;
};

export type GenerateAsyncOptions = {
    listener?: GenerationListener;
    signal?: AbortSignal;
    batchSize?: number;
};

/**
 * Produces unique, filtered, formatted usernames from injected vocabulary and filter.
 * The core loop is synchronous; generateAsync yields between batches for callers with a UI.
 */
export class UsernameGenerator {
    private readonly options: Required<UsernameGeneratorOptions>;

    constructor(options: UsernameGeneratorOptions) {
        this.options = {
            vocabulary: options.vocabulary,
            filter: options.filter,
            random: options.random ?? Math.random,
            languagePolicy: options.languagePolicy ?? "random",
            maxAttemptsPerSlot: options.maxAttemptsPerSlot ?? DEFAULT_MAX_ATTEMPTS_PER_SLOT,
            minWordLength: options.minWordLength ?? DEFAULT_MIN_WORD_LENGTH,
            unavailableLanguages: options.unavailableLanguages ?? "skip"
        };
    }

    /**
     * Creates an idle run; the caller advances it with step() or cancel().
     */
    start(request: GenerationRequest, listener?: GenerationListener): UsernameGenerationRun {
        return new UsernameGenerationRun(request, { ...this.options, listener });
    }

    /**
     * Runs to completion on the calling stack.
     * isCancelled is checked before every sampling attempt.
     */
    generate(request: GenerationRequest, options: GenerateOptions = {}): GenerationResult {
        const run = this.start(request, options.listener);
        let result: GenerationResult | null = null;
        while (result === null) {
            result = options.isCancelled?.() ? run.cancel() : run.step();
        }
        return result;
    }

    /**
     * Runs in batches of attempts, yielding to the event loop between batches.
     * An aborted signal cancels the run before the next attempt.
     * A batchSize that is not a positive integer falls back to the default.
     */
    async generateAsync(request: GenerationRequest, options: GenerateAsyncOptions = {}): Promise<GenerationResult> {
        const run = this.start(request, options.listener);
        const requestedBatchSize = options.batchSize ?? DEFAULT_ASYNC_BATCH_SIZE;
        const batchSize =
            Number.isInteger(requestedBatchSize) && requestedBatchSize > 0 ? requestedBatchSize : DEFAULT_ASYNC_BATCH_SIZE;
        for (;;) {
            for (let index = 0; index < batchSize; index += 1) {
                const result = options.signal?.aborted ? run.cancel() : run.step();
                if (result) {
                    return result;
                }
            }
            await yieldToEventLoop();
        }
    }
}
