import type { CaseMode, GenerationRequest, LanguageTag, SuffixMode } from "../types.js";

export type GenerationRequestInput = {
    count: number;
    caseMode: CaseMode;
    suffixMode: SuffixMode;
    languages: readonly LanguageTag[];
};

/**
 * Validates and freezes a generation request; duplicate languages keep their first position.
 */
export function generationRequestCreate(input: GenerationRequestInput): GenerationRequest {
    if (!Number.isInteger(input.count) || input.count < 0) {
        throw new Error(`Username count must be a non-negative integer, got ${input.count}`);
    }
    const languages = [...new Set(input.languages)];
    if (languages.length === 0) {
        throw new Error("At least one language is required");
    }
    return Object.freeze({
        count: input.count,
        caseMode: input.caseMode,
        suffixMode: input.suffixMode,
        languages: Object.freeze(languages)
    });
}
