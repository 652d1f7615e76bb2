import type { LanguageTag } from "./languages/languageCatalog.js";

export type { LanguageTag } from "./languages/languageCatalog.js";

export type CaseMode = "lower" | "upper" | "capitalized";

export type SuffixMode = "none" | "1-digit" | "2-digit" | "3-digit";

export type LanguagePolicy = "random" | "round-robin";

export type UnavailableLanguagePolicy = "skip" | "abort";

/**
 * Returns a float in [0, 1). Math.random satisfies this contract.
 */
export type RandomSource = () => number;

export type LexiconEntry = {
    language: LanguageTag;
    word: string;
};

export type GenerationRequest = {
    readonly count: number;
    readonly caseMode: CaseMode;
    readonly suffixMode: SuffixMode;
    readonly languages: readonly LanguageTag[];
};

export type GeneratedUsername = {
    value: string;
    language: LanguageTag;
    suffix: string | null;
};

export type FormatResult = {
    value: string;
    base: string;
    suffix: string | null;
};

export type RejectReason = "profanity" | "duplicate" | "non_ascii" | "too_short";

export type GenerationState = "idle" | "running" | "completed" | "cancelled" | "failed";

export const CASE_MODES: readonly CaseMode[] = ["lower", "upper", "capitalized"];
export const SUFFIX_MODES: readonly SuffixMode[] = ["none", "1-digit", "2-digit", "3-digit"];
export const LANGUAGE_POLICIES: readonly LanguagePolicy[] = ["random", "round-robin"];
