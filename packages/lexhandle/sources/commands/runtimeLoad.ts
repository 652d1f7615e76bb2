import type { Config } from "../config/configTypes.js";
import type { ContentFilter } from "../filter/contentFilter.js";
import { contentFilterLoad } from "../filter/contentFilterLoad.js";
import type { LexiconDataset } from "../lexicon/lexiconDataset.js";
import { DEFAULT_LEXICON_DIR, lexiconDatasetLoad } from "../lexicon/lexiconDatasetLoad.js";
import { VocabularySource } from "../lexicon/vocabularySource.js";
import { UsernameGenerator } from "../generate/usernameGenerator.js";
import type { LanguagePolicy, RandomSource } from "../types.js";

export type Runtime = {
    config: Config;
    dataset: LexiconDataset;
    filter: ContentFilter;
};

/**
 * Loads the word lists and denylist named by config. Runs once per process.
 */
export async function runtimeLoad(config: Config): Promise<Runtime> {
    const directories = config.dataDir ? [config.dataDir, DEFAULT_LEXICON_DIR] : [DEFAULT_LEXICON_DIR];
    const [dataset, filter] = await Promise.all([
        lexiconDatasetLoad({ directories }),
        contentFilterLoad({ path: config.denylistPath, extraWords: [...config.denylistExtraWords] })
    ]);
    return { config, dataset, filter };
}

/**
 * Builds a generator over the runtime's dataset and filter with configured limits.
 */
export function runtimeGeneratorBuild(
    runtime: Runtime,
    random: RandomSource,
    languagePolicy: LanguagePolicy = runtime.config.generation.languagePolicy
): UsernameGenerator {
    const { generation } = runtime.config;
    return new UsernameGenerator({
        vocabulary: new VocabularySource(runtime.dataset, { random }),
        filter: runtime.filter,
        random,
        languagePolicy,
        maxAttemptsPerSlot: generation.maxAttemptsPerSlot,
        minWordLength: generation.minWordLength,
        unavailableLanguages: generation.unavailableLanguages
    });
}
