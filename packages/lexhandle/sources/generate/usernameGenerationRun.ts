import { createId } from "@paralleldrive/cuid2";

import type { ContentFilter } from "../filter/contentFilter.js";
import { usernameFormat } from "../format/usernameFormat.js";
import type { VocabularySource } from "../lexicon/vocabularySource.js";
import { getLogger } from "../log.js";
import type {
    FormatResult,
    GeneratedUsername,
    GenerationRequest,
    GenerationState,
    LanguagePolicy,
    LanguageTag,
    RandomSource,
    RejectReason,
    UnavailableLanguagePolicy
} from "../types.js";
import { GenerationError, generationErrorIs } from "./generationError.js";
import type { GenerationListener, GenerationResult } from "./generationTypes.js";
import { languagePick } from "./languagePick.js";

const logger = getLogger("generate.run");

export type UsernameGenerationRunOptions = {
    vocabulary: VocabularySource;
    filter: ContentFilter;
    random: RandomSource;
    languagePolicy: LanguagePolicy;
    maxAttemptsPerSlot: number;
    minWordLength: number;
    unavailableLanguages: UnavailableLanguagePolicy;
    listener?: GenerationListener;
};

/**
 * A single generation run, advanced one sampling attempt at a time.
 * States: idle -> running -> completed | cancelled | failed.
 */
export class UsernameGenerationRun {
    readonly runId = createId();
    readonly request: GenerationRequest;
    private readonly options: UsernameGenerationRunOptions;
    private readonly accepted: GeneratedUsername[] = [];
    private readonly values = new Set<string>();
    private languages: readonly LanguageTag[] = [];
    private currentState: GenerationState = "idle";
    private finalResult: GenerationResult | null = null;
    private slotAttempts = 0;
    private totalAttempts = 0;

    constructor(request: GenerationRequest, options: UsernameGenerationRunOptions) {
        this.request = request;
        this.options = options;
    }

    get state(): GenerationState {
        return this.currentState;
    }

    get usernames(): readonly GeneratedUsername[] {
        return this.accepted;
    }

    get result(): GenerationResult | null {
        return this.finalResult;
    }

    /**
     * Performs one sampling attempt, starting the run on first call.
     * Returns: the final result once the run has ended, otherwise null.
     */
    step(): GenerationResult | null {
        if (this.finalResult) {
            return this.finalResult;
        }
        if (this.currentState === "idle") {
            this.begin();
            if (this.finalResult) {
                return this.finalResult;
            }
        }
        this.attempt();
        return this.finalResult;
    }

    /**
     * Ends the run with the usernames accepted so far. No-op once finished.
     */
    cancel(): GenerationResult {
        if (this.finalResult) {
            return this.finalResult;
        }
        return this.finish({ status: "cancelled", ...this.resultBase() });
    }

    private begin(): void {
        this.currentState = "running";
        const { request } = this;
        if (request.count === 0) {
            this.finish({ status: "completed", ...this.resultBase() });
            return;
        }

        logger.info(
            {
                runId: this.runId,
                count: request.count,
                caseMode: request.caseMode,
                suffixMode: request.suffixMode,
                languages: request.languages.join(","),
                policy: this.options.languagePolicy
            },
            "event: Generation started"
        );

        const unready = request.languages.filter((language) => !this.options.vocabulary.isReady(language));
        const ready = request.languages.filter((language) => this.options.vocabulary.isReady(language));
        const firstUnready = unready[0];
        if (firstUnready !== undefined && (this.options.unavailableLanguages === "abort" || ready.length === 0)) {
            const error = new GenerationError("resource_unavailable", `Word list is not loaded for ${firstUnready}`, {
                language: firstUnready,
                details: `unready=${unready.join(",")}`
            });
            this.finish({ status: "failed", error, ...this.resultBase() });
            return;
        }
        if (firstUnready !== undefined) {
            logger.warn({ runId: this.runId, skipped: unready.join(",") }, "skip: Languages without word lists");
        }

        this.languages = ready;
        this.options.listener?.onStart?.({ runId: this.runId, request, languages: ready });
    }

    private attempt(): void {
        if (this.slotAttempts >= this.options.maxAttemptsPerSlot) {
            const error = new GenerationError(
                "generation_exhausted",
                `No acceptable username after ${this.slotAttempts} attempts`,
                { details: `produced=${this.accepted.length} requested=${this.request.count}` }
            );
            this.finish({ status: "failed", error, ...this.resultBase() });
            return;
        }

        const language = languagePick(
            this.languages,
            this.options.languagePolicy,
            this.options.random,
            this.totalAttempts
        );
        this.slotAttempts += 1;
        this.totalAttempts += 1;

        let word: string;
        try {
            word = this.options.vocabulary.sample(language, this.options.random).word;
        } catch (error) {
            if (generationErrorIs(error, "resource_unavailable")) {
                this.finish({ status: "failed", error, ...this.resultBase() });
                return;
            }
            throw error;
        }

        let formatted: FormatResult;
        try {
            formatted = usernameFormat(word, this.request.caseMode, this.request.suffixMode, {
                random: this.options.random,
                minWordLength: this.options.minWordLength,
                language
            });
        } catch (error) {
            if (generationErrorIs(error, "non_ascii_word")) {
                this.reject("non_ascii", language, word);
                return;
            }
            if (generationErrorIs(error, "word_too_short")) {
                this.reject("too_short", language, word);
                return;
            }
            throw error;
        }

        // base has separators removed, so the raw lemma is checked for denylisted parts
        if (!this.options.filter.isClean(formatted.base) || !this.options.filter.isClean(word)) {
            this.reject("profanity", language, word);
            return;
        }
        if (this.values.has(formatted.value)) {
            this.reject("duplicate", language, word);
            return;
        }

        const username: GeneratedUsername = { value: formatted.value, language, suffix: formatted.suffix };
        this.accepted.push(username);
        this.values.add(username.value);
        this.slotAttempts = 0;
        logger.debug(
            `event: Username accepted runId=${this.runId} value=${username.value} language=${language} produced=${this.accepted.length}`
        );
        this.options.listener?.onAccept?.(username, {
            produced: this.accepted.length,
            requested: this.request.count,
            attempts: this.totalAttempts
        });

        if (this.accepted.length >= this.request.count) {
            this.finish({ status: "completed", ...this.resultBase() });
        }
    }

    private reject(reason: RejectReason, language: LanguageTag, word: string): void {
        logger.debug({ runId: this.runId, reason, language, word }, "skip: Candidate rejected");
        this.options.listener?.onReject?.({ reason, language, word });
    }

    private resultBase() {
        return {
            runId: this.runId,
            usernames: [...this.accepted],
            requested: this.request.count,
            attempts: this.totalAttempts
        };
    }

    private finish(result: GenerationResult): GenerationResult {
        this.currentState = result.status;
        this.finalResult = result;
        const fields = {
            runId: this.runId,
            status: result.status,
            produced: result.usernames.length,
            requested: result.requested,
            attempts: result.attempts
        };
        if (result.status === "failed") {
            logger.warn(
                { ...fields, kind: result.error.kind, language: result.error.language, details: result.error.details },
                "event: Generation failed"
            );
        } else {
            logger.info(fields, "event: Generation finished");
        }
        this.options.listener?.onFinish?.(result);
        return result;
    }
}
