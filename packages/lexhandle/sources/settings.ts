import { LANGUAGE_TAGS } from "./languages/languageCatalog.js";
import { resolveLexhandlePath } from "./paths.js";
import type {
    CaseMode,
    LanguagePolicy,
    LanguageTag,
    SuffixMode,
    UnavailableLanguagePolicy
} from "./types.js";

export const DEFAULT_SETTINGS_PATH = resolveLexhandlePath("settings.json");

export type DenylistSettings = {
    path?: string;
    extraWords?: string[];
};

export type GenerationSettings = {
    count?: number;
    caseMode?: CaseMode;
    suffixMode?: SuffixMode;
    languages?: LanguageTag[];
    languagePolicy?: LanguagePolicy;
    maxAttemptsPerSlot?: number;
    minWordLength?: number;
    unavailableLanguages?: UnavailableLanguagePolicy;
};

export type SettingsConfig = {
    dataDir?: string;
    denylist?: DenylistSettings;
    generation?: GenerationSettings;
};

export type ResolvedGenerationSettings = Required<GenerationSettings>;

/**
 * Forty lowercase words from every supported language, no suffix.
 */
export const GENERATION_DEFAULTS: Readonly<ResolvedGenerationSettings> = {
    count: 40,
    caseMode: "lower",
    suffixMode: "none",
    languages: [...LANGUAGE_TAGS],
    languagePolicy: "random",
    maxAttemptsPerSlot: 200,
    minWordLength: 3,
    unavailableLanguages: "skip"
};
