import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import { getLogger } from "../log.js";
import { ContentFilter } from "./contentFilter.js";

const logger = getLogger("filter.load");

export const DEFAULT_DENYLIST_PATH = fileURLToPath(new URL("../../data/denylist.json", import.meta.url));

const denylistSchema = z
    .object({
        version: z.string().min(1),
        words: z.array(z.string())
    })
    .strict();

export type ContentFilterLoadOptions = {
    path?: string | null;
    extraWords?: string[];
};

/**
 * Reads a denylist JSON file and builds the content filter.
 * Expects: the file holds { version, words[] }; extraWords are appended.
 */
export async function contentFilterLoad(options: ContentFilterLoadOptions = {}): Promise<ContentFilter> {
    const denylistPath = options.path ?? DEFAULT_DENYLIST_PATH;
    let rawText: string;
    try {
        rawText = await readFile(denylistPath, "utf-8");
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "could not read denylist";
        throw new Error(`Failed to read denylist at ${denylistPath}: ${details}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawText);
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "invalid json";
        throw new Error(`Failed to parse denylist at ${denylistPath}: ${details}`);
    }

    const result = denylistSchema.safeParse(parsed);
    if (!result.success) {
        throw new Error(`Invalid denylist at ${denylistPath}: ${result.error.issues[0]?.message ?? "unknown error"}`);
    }

    const filter = new ContentFilter([...result.data.words, ...(options.extraWords ?? [])]);
    logger.debug(`load: Denylist loaded version=${result.data.version} words=${filter.size}`);
    return filter;
}
