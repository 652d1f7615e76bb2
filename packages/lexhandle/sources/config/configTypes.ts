import type { ResolvedGenerationSettings } from "../settings.js";

export type Config = {
    settingsPath: string;
    configDir: string;
    dataDir: string | null;
    denylistPath: string | null;
    denylistExtraWords: readonly string[];
    generation: Readonly<ResolvedGenerationSettings>;
};

export type ConfigOverrides = {
    dataDir?: string;
};
