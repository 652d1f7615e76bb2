import { randomIntBelow } from "../random/randomIntBelow.js";
import type { LanguagePolicy, LanguageTag, RandomSource } from "../types.js";

/**
 * Picks the language for one sampling attempt.
 * Expects: languages is non-empty; attempt counts from 0 within the run.
 */
export function languagePick(
    languages: readonly LanguageTag[],
    policy: LanguagePolicy,
    random: RandomSource,
    attempt: number
): LanguageTag {
    const index = policy === "round-robin" ? attempt % languages.length : randomIntBelow(random, languages.length);
    const language = languages[index];
    if (language === undefined) {
        throw new Error("Cannot pick a language from an empty list");
    }
    return language;
}
