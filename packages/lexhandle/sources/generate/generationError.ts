import type { LanguageTag } from "../types.js";

export type GenerationErrorKind =
    | "resource_unavailable"
    | "non_ascii_word"
    | "word_too_short"
    | "generation_exhausted";

export type GenerationErrorOptions = {
    language?: LanguageTag;
    word?: string;
    details?: string;
    cause?: unknown;
};

/**
 * Error raised by the generation pipeline.
 * Expects: kind is stable and drives both recovery and user-facing formatting.
 */
export class GenerationError extends Error {
    readonly kind: GenerationErrorKind;
    readonly language?: LanguageTag;
    readonly word?: string;
    readonly details?: string;

    constructor(kind: GenerationErrorKind, message: string, options: GenerationErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = "GenerationError";
        this.kind = kind;
        this.language = options.language;
        this.word = options.word;
        this.details = options.details;
    }
}

export function generationErrorIs(error: unknown, kind?: GenerationErrorKind): error is GenerationError {
    if (!(error instanceof GenerationError)) {
        return false;
    }
    return kind === undefined || error.kind === kind;
}
