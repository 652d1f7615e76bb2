import type { GeneratedUsername, GenerationRequest, LanguageTag, RejectReason } from "../types.js";
import type { GenerationError } from "./generationError.js";

export type GenerationProgress = {
    produced: number;
    requested: number;
    attempts: number;
};

type GenerationResultBase = {
    runId: string;
    usernames: GeneratedUsername[];
    requested: number;
    attempts: number;
};

export type GenerationResult =
    | (GenerationResultBase & { status: "completed" })
    | (GenerationResultBase & { status: "cancelled" })
    | (GenerationResultBase & { status: "failed"; error: GenerationError });

export type GenerationStartEvent = {
    runId: string;
    request: GenerationRequest;
    languages: readonly LanguageTag[];
};

export type GenerationRejectEvent = {
    reason: RejectReason;
    language: LanguageTag;
    word: string;
};

/**
 * One-way notification channel from a run to its presenter. Every member is optional.
 */
export type GenerationListener = {
    onStart?: (event: GenerationStartEvent) => void;
    onAccept?: (username: GeneratedUsername, progress: GenerationProgress) => void;
    onReject?: (event: GenerationRejectEvent) => void;
    onFinish?: (result: GenerationResult) => void;
};
