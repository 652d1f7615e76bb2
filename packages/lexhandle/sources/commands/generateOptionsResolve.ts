import { generationRequestCreate } from "../generate/generationRequestCreate.js";
import { languageTagsParse } from "../languages/languageCatalog.js";
import type { ResolvedGenerationSettings } from "../settings.js";
import {
    CASE_MODES,
    type CaseMode,
    type GenerationRequest,
    LANGUAGE_POLICIES,
    type LanguagePolicy,
    type LanguageTag,
    SUFFIX_MODES,
    type SuffixMode
} from "../types.js";

export type GenerateCommandOptions = {
    settings?: string;
    count?: string;
    case?: string;
    suffix?: string;
    languages?: string;
    policy?: string;
    seed?: string;
    json?: boolean;
    unsorted?: boolean;
};

export type GenerateResolvedOptions = {
    request: GenerationRequest;
    languagePolicy: LanguagePolicy;
    seed: number | null;
    json: boolean;
    sorted: boolean;
};

/**
 * Resolves generate command flags on top of configured generation defaults.
 * Expects: flag values are raw strings from commander; errors name the flag.
 */
export function generateOptionsResolve(
    options: GenerateCommandOptions,
    defaults: Readonly<ResolvedGenerationSettings>
): GenerateResolvedOptions {
    const count = options.count === undefined ? defaults.count : integerParse(options.count, "--count", 0);
    const caseMode = options.case === undefined ? defaults.caseMode : choiceParse(options.case, "--case", CASE_MODES);
    const suffixMode =
        options.suffix === undefined ? defaults.suffixMode : choiceParse(options.suffix, "--suffix", SUFFIX_MODES);
    const languages = options.languages === undefined ? defaults.languages : languagesParse(options.languages);
    const languagePolicy =
        options.policy === undefined
            ? defaults.languagePolicy
            : choiceParse(options.policy, "--policy", LANGUAGE_POLICIES);
    const seed = options.seed === undefined ? null : integerParse(options.seed, "--seed", 0);

    return {
        request: generationRequestCreate({ count, caseMode, suffixMode, languages }),
        languagePolicy,
        seed,
        json: options.json ?? false,
        sorted: !(options.unsorted ?? false)
    };
}

function integerParse(value: string, flag: string, min: number): number {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (trimmed.length === 0 || !Number.isSafeInteger(parsed) || parsed < min) {
        throw new Error(`Invalid ${flag} "${value}": expected an integer of at least ${min}`);
    }
    return parsed;
}

function choiceParse<TValue extends CaseMode | SuffixMode | LanguagePolicy>(
    value: string,
    flag: string,
    choices: readonly TValue[]
): TValue {
    const normalized = value.trim().toLowerCase();
    const match = choices.find((choice) => choice === normalized);
    if (match === undefined) {
        throw new Error(`Invalid ${flag} "${value}": expected one of ${choices.join(", ")}`);
    }
    return match;
}

function languagesParse(value: string): LanguageTag[] {
    try {
        return languageTagsParse(value);
    } catch (error) {
        const details = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid --languages "${value}": ${details}`);
    }
}
