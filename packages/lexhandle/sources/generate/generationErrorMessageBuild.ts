import { languageNameGet } from "../languages/languageCatalog.js";
import type { GenerationError } from "./generationError.js";

/**
 * Builds the message shown to users for a failed run.
 * Names the language or parameter at fault; diagnostics stay in the log.
 */
export function generationErrorMessageBuild(error: GenerationError, produced: number, requested: number): string {
    switch (error.kind) {
        case "resource_unavailable":
            return error.language
                ? `No word list is available for ${languageNameGet(error.language)} (${error.language}).`
                : "No word list is available for any requested language.";
        case "generation_exhausted":
            return `Only ${produced} of ${requested} usernames could be generated. Try more languages, a longer suffix or a smaller count.`;
        case "non_ascii_word":
        case "word_too_short":
            return error.language
                ? `A word from ${languageNameGet(error.language)} (${error.language}) could not be used.`
                : "A word could not be used.";
    }
}
