import { languageNameGet } from "../languages/languageCatalog.js";
import type { GeneratedUsername } from "../types.js";

export type UsernameTableFormatOptions = {
    sorted?: boolean;
};

/**
 * Renders usernames as a two-column text table (username, language).
 * Expects: sorted defaults to true and orders rows by username.
 */
export function usernameTableFormat(
    usernames: readonly GeneratedUsername[],
    options: UsernameTableFormatOptions = {}
): string {
    const rows = usernames.map((username) => [
        username.value,
        `${languageNameGet(username.language)} (${username.language})`
    ] as const);
    if (options.sorted ?? true) {
        rows.sort((left, right) => (left[0] < right[0] ? -1 : left[0] > right[0] ? 1 : 0));
    }
    const header = ["Username", "Language"] as const;
    const width = Math.max(header[0].length, ...rows.map((row) => row[0].length));
    const lines = [
        `${header[0].padEnd(width)}  ${header[1]}`,
        `${"-".repeat(width)}  ${"-".repeat(header[1].length)}`,
        ...rows.map((row) => `${row[0].padEnd(width)}  ${row[1]}`)
    ];
    return lines.join("\n");
}
