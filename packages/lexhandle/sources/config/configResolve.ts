import path from "node:path";

import { GENERATION_DEFAULTS, type SettingsConfig } from "../settings.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

/**
 * Resolves paths and generation defaults into an immutable Config snapshot.
 * Expects: settings already validated; relative paths resolve against the settings file directory.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const configDir = path.dirname(resolvedSettingsPath);
    const dataDirRaw = overrides.dataDir ?? envValue("LEXHANDLE_DATA_DIR") ?? settings.dataDir ?? null;
    const denylistPathRaw = settings.denylist?.path ?? null;
    const generation = settings.generation ?? {};

    return Object.freeze({
        settingsPath: resolvedSettingsPath,
        configDir,
        dataDir: dataDirRaw === null ? null : path.resolve(configDir, dataDirRaw),
        denylistPath: denylistPathRaw === null ? null : path.resolve(configDir, denylistPathRaw),
        denylistExtraWords: Object.freeze([...(settings.denylist?.extraWords ?? [])]),
        generation: Object.freeze({
            count: generation.count ?? GENERATION_DEFAULTS.count,
            caseMode: generation.caseMode ?? GENERATION_DEFAULTS.caseMode,
            suffixMode: generation.suffixMode ?? GENERATION_DEFAULTS.suffixMode,
            languages: [...(generation.languages ?? GENERATION_DEFAULTS.languages)],
            languagePolicy: generation.languagePolicy ?? GENERATION_DEFAULTS.languagePolicy,
            maxAttemptsPerSlot: generation.maxAttemptsPerSlot ?? GENERATION_DEFAULTS.maxAttemptsPerSlot,
            minWordLength: generation.minWordLength ?? GENERATION_DEFAULTS.minWordLength,
            unavailableLanguages: generation.unavailableLanguages ?? GENERATION_DEFAULTS.unavailableLanguages
        })
    });
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value ? value : null;
}
