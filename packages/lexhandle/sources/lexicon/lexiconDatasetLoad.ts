import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { LANGUAGE_TAGS } from "../languages/languageCatalog.js";
import { getLogger } from "../log.js";
import type { LanguageTag } from "../types.js";
import { LEXICON_BUILTIN_ENGLISH_SOURCE, lexiconBuiltinEnglish } from "./lexiconBuiltinEnglish.js";
import { LexiconDataset, type LexiconWordList } from "./lexiconDataset.js";
import { type LexiconFileFormat, lexiconFileParse } from "./lexiconFileParse.js";

const logger = getLogger("lexicon.load");

export const DEFAULT_LEXICON_DIR = fileURLToPath(new URL("../../data/lexicon/", import.meta.url));

export type LexiconDatasetLoadOptions = {
    directories: readonly string[];
    languages?: readonly LanguageTag[];
    builtinEnglish?: boolean;
};

type LexiconFileCandidate = {
    filePath: string;
    format: LexiconFileFormat;
};

/**
 * Loads word lists for each language from the first directory that has one.
 * Expects: directories are ordered by priority; missing files are skipped.
 * Returns: a dataset where languages without a usable list are unready.
 */
export async function lexiconDatasetLoad(options: LexiconDatasetLoadOptions): Promise<LexiconDataset> {
    const languages = options.languages ?? LANGUAGE_TAGS;
    const lists: Array<[LanguageTag, LexiconWordList]> = [];

    for (const language of languages) {
        const list = await languageListLoad(language, options.directories);
        if (list) {
            lists.push([language, list]);
            logger.debug(`load: Word list ready language=${language} words=${list.words.length} source=${list.source}`);
            continue;
        }
        if (language === "eng" && options.builtinEnglish !== false) {
            const words = lexiconBuiltinEnglish();
            lists.push([language, { words, source: LEXICON_BUILTIN_ENGLISH_SOURCE }]);
            logger.debug(`load: Using builtin English word list words=${words.length}`);
            continue;
        }
        logger.debug(`load: No word list found language=${language}`);
    }

    const dataset = new LexiconDataset(lists);
    logger.info(
        { ready: dataset.readyLanguages().length, requested: languages.length },
        "event: Lexicon dataset loaded"
    );
    return dataset;
}

async function languageListLoad(language: LanguageTag, directories: readonly string[]): Promise<LexiconWordList | null> {
    for (const directory of directories) {
        for (const candidate of candidatesBuild(directory, language)) {
            let content: string;
            try {
                content = await readFile(candidate.filePath, "utf-8");
            } catch (error) {
                if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                    continue;
                }
                logger.warn({ language, file: candidate.filePath, error }, "error: Failed to read word list");
                return null;
            }
            const words = lexiconFileParse(content, candidate.format, language);
            if (words.length === 0) {
                logger.warn({ language, file: candidate.filePath }, "skip: Word list is empty");
                return null;
            }
            return { words, source: candidate.filePath };
        }
    }
    return null;
}

function candidatesBuild(directory: string, language: LanguageTag): LexiconFileCandidate[] {
    return [
        { filePath: path.join(directory, `${language}.txt`), format: "txt" },
        { filePath: path.join(directory, `wn-data-${language}.tab`), format: "tab" }
    ];
}
