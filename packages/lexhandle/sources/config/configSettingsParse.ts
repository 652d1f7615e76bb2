import { z } from "zod";

import { LANGUAGE_TAGS, languageTagIs } from "../languages/languageCatalog.js";
import type { SettingsConfig } from "../settings.js";

const languageTag = z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .refine(languageTagIs, (value) => ({
        message: `Unknown language "${value}". Supported: ${LANGUAGE_TAGS.join(", ")}`
    }));

const settingsSchema = z
    .object({
        dataDir: z.string().min(1).optional(),
        denylist: z
            .object({
                path: z.string().min(1).optional(),
                extraWords: z.array(z.string().min(1)).optional()
            })
            .strict()
            .optional(),
        generation: z
            .object({
                count: z.number().int().min(0).optional(),
                caseMode: z.enum(["lower", "upper", "capitalized"]).optional(),
                suffixMode: z.enum(["none", "1-digit", "2-digit", "3-digit"]).optional(),
                languages: z.array(languageTag).min(1).optional(),
                languagePolicy: z.enum(["random", "round-robin"]).optional(),
                maxAttemptsPerSlot: z.number().int().min(1).max(100_000).optional(),
                minWordLength: z.number().int().min(1).max(32).optional(),
                unavailableLanguages: z.enum(["skip", "abort"]).optional()
            })
            .strict()
            .optional()
    })
    .strict();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible and matches the settings schema.
 * Throws: an Error naming the first offending setting, e.g. "generation.count: ...".
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    const result = settingsSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        if (!issue) {
            throw new Error("unknown settings error");
        }
        const location = issue.path.join(".");
        throw new Error(location.length > 0 ? `${location}: ${issue.message}` : issue.message);
    }
    return result.data;
}
