import type { CaseMode } from "../types.js";

export function wordCaseApply(word: string, mode: CaseMode): string {
    switch (mode) {
        case "lower":
            return word.toLowerCase();
        case "upper":
            return word.toUpperCase();
        case "capitalized":
            return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
    }
}
