import { configLoad } from "../config/configLoad.js";
import { LANGUAGE_TAGS, languageNameGet } from "../languages/languageCatalog.js";
import { lexiconUsableCount } from "../lexicon/lexiconUsableCount.js";
import { runtimeLoad } from "./runtimeLoad.js";

export type LanguagesCommandOptions = {
    settings?: string;
};

/**
 * Lists supported languages with their word list readiness.
 * A single language can yield at most its usable count of distinct usernames without a suffix.
 */
export async function languagesCommand(options: LanguagesCommandOptions): Promise<void> {
    const config = await configLoad(options.settings);
    const { dataset, filter } = await runtimeLoad(config);

    const nameWidth = Math.max(...LANGUAGE_TAGS.map((tag) => languageNameGet(tag).length));
    let ready = 0;
    for (const tag of LANGUAGE_TAGS) {
        const name = languageNameGet(tag).padEnd(nameWidth);
        if (!dataset.isReady(tag)) {
            console.log(`  ${tag}  ${name}  missing`);
            continue;
        }
        ready += 1;
        const usable = lexiconUsableCount(dataset.words(tag), filter, config.generation.minWordLength);
        console.log(
            `  ${tag}  ${name}  ${String(dataset.wordCount(tag)).padStart(6)} words  ${String(usable).padStart(6)} usable  ${dataset.source(tag) ?? ""}`
        );
    }
    console.log(`${ready} of ${LANGUAGE_TAGS.length} languages ready.`);
}
