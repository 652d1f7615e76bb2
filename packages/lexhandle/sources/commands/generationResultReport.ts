import { generationErrorMessageBuild } from "../generate/generationErrorMessageBuild.js";
import type { GenerationResult } from "../generate/generationTypes.js";

/**
 * Summarizes how a run ended for the terminal.
 * Returns: null for a completed run.
 */
export function generationResultReport(result: GenerationResult): string | null {
    switch (result.status) {
        case "completed":
            return null;
        case "cancelled":
            return `Cancelled after ${result.usernames.length} of ${result.requested} usernames.`;
        case "failed":
            return generationErrorMessageBuild(result.error, result.usernames.length, result.requested);
    }
}
