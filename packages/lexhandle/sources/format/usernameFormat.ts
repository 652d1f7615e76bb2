import { GenerationError } from "../generate/generationError.js";
import type { CaseMode, FormatResult, LanguageTag, RandomSource, SuffixMode } from "../types.js";
import { suffixGenerate } from "./suffixGenerate.js";
import { wordAsciiReduce } from "./wordAsciiReduce.js";
import { wordCaseApply } from "./wordCaseApply.js";

export const DEFAULT_MIN_WORD_LENGTH = 3;

export type UsernameFormatOptions = {
    random: RandomSource;
    minWordLength?: number;
    language?: LanguageTag;
};

/**
 * Turns a raw lemma into a username: ASCII reduction, case, then suffix.
 * Expects: the suffix draw is the only use of options.random.
 * Throws: GenerationError non_ascii_word or word_too_short when the lemma is unusable.
 */
export function usernameFormat(
    rawWord: string,
    caseMode: CaseMode,
    suffixMode: SuffixMode,
    options: UsernameFormatOptions
): FormatResult {
    const reduced = wordAsciiReduce(rawWord);
    if (reduced === null) {
        throw new GenerationError("non_ascii_word", `Word cannot be reduced to ASCII: ${rawWord}`, {
            language: options.language,
            word: rawWord
        });
    }
    const minWordLength = options.minWordLength ?? DEFAULT_MIN_WORD_LENGTH;
    if (reduced.length < minWordLength) {
        throw new GenerationError("word_too_short", `Word is shorter than ${minWordLength} characters: ${rawWord}`, {
            language: options.language,
            word: rawWord
        });
    }

    const suffix = suffixGenerate(suffixMode, options.random);
    return {
        value: wordCaseApply(reduced, caseMode) + (suffix ?? ""),
        base: reduced.toLowerCase(),
        suffix
    };
}
