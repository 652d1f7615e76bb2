import type { LanguageTag } from "../types.js";

export type LexiconFileFormat = "txt" | "tab";

/**
 * Extracts lemmas from a word list file.
 *
 * Expects: "txt" holds one lemma per line with "#" comments; "tab" is an
 *          Open Multilingual Wordnet export ("synset<TAB>lang:lemma<TAB>word").
 * Returns: trimmed lemmas in file order without duplicates.
 */
export function lexiconFileParse(content: string, format: LexiconFileFormat, language: LanguageTag): string[] {
    const seen = new Set<string>();
    const words: string[] = [];
    for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line.length === 0 || line.startsWith("#")) {
            continue;
        }
        const word = format === "txt" ? line : tabLemmaExtract(rawLine, language);
        if (word === null || word.length === 0 || seen.has(word)) {
            continue;
        }
        seen.add(word);
        words.push(word);
    }
    return words;
}

function tabLemmaExtract(line: string, language: LanguageTag): string | null {
    const columns = line.split("\t");
    if (columns.length < 3) {
        return null;
    }
    const type = columns[1]?.trim();
    if (type !== "lemma" && type !== `${language}:lemma`) {
        return null;
    }
    return columns[2]?.trim() ?? null;
}
