import { promises as fs } from "node:fs";
import path from "node:path";

import { DEFAULT_SETTINGS_PATH, type SettingsConfig } from "../settings.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

/**
 * Loads, validates, and resolves the config from disk into an immutable snapshot.
 * Expects: settingsPath points at the JSON settings file; a missing file means defaults.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {}
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    let raw: unknown = {};

    try {
        const content = await fs.readFile(resolvedPath, "utf8");
        raw = JSON.parse(content);
    } catch (error) {
        if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
            const details = error instanceof Error && error.message ? error.message : "could not read settings";
            throw new Error(`Failed to read settings at ${resolvedPath}: ${details}`);
        }
    }

    let settings: SettingsConfig;
    try {
        settings = configSettingsParse(raw);
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "unknown settings error";
        throw new Error(`Invalid settings at ${resolvedPath}: ${details}`);
    }
    return configResolve(settings, resolvedPath, overrides);
}
