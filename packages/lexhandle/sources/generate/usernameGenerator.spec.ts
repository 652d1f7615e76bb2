import { describe, expect, it, vi } from "vitest";

import { ContentFilter } from "../filter/contentFilter.js";
import { LexiconDataset } from "../lexicon/lexiconDataset.js";
import { VocabularySource } from "../lexicon/vocabularySource.js";
import { randomSeeded } from "../random/randomSeeded.js";
import type { GenerationRequest, RandomSource } from "../types.js";
import { generationRequestCreate } from "./generationRequestCreate.js";
import type { GenerationRejectEvent } from "./generationTypes.js";
import { UsernameGenerator, type UsernameGeneratorOptions } from "./usernameGenerator.js";

const dataset = LexiconDataset.fromWords({
    fra: ["maison", "jardin", "fenêtre", "porte", "café"],
    spa: ["casa", "perro", "gato", "luna"],
    lit: ["badword"],
    fin: ["kissa"],
    dan: ["hus"],
    nob: ["smørbrød", "ox", "fjell"]
});
const filter = new ContentFilter(["badword"]);

function generatorCreate(options: Partial<UsernameGeneratorOptions> = {}): UsernameGenerator {
    const random = options.random ?? randomSeeded(2024);
    return new UsernameGenerator({
        vocabulary: new VocabularySource(dataset, { random }),
        filter,
        random,
        ...options
    });
}

function randomScripted(values: number[]): RandomSource {
    let index = 0;
    return () => {
        const value = values[index % values.length] ?? 0;
        index += 1;
        return value;
    };
}

function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
    return generationRequestCreate({
        count: 6,
        caseMode: "lower",
        suffixMode: "none",
        languages: ["fra", "spa"],
        ...overrides
    });
}

describe("UsernameGenerator", () => {
    it("returns exactly the requested number of unique usernames", () => {
        const result = generatorCreate().generate(request());

        expect(result.status).toBe("completed");
        expect(result.usernames).toHaveLength(6);
        const values = result.usernames.map((username) => username.value);
        expect(new Set(values).size).toBe(6);
        for (const username of result.usernames) {
            expect(username.value).toMatch(/^[A-Za-z0-9_]+$/);
            expect(["fra", "spa"]).toContain(username.language);
            expect(username.suffix).toBeNull();
        }
    });

    it("applies case and suffix to every username", () => {
        const result = generatorCreate().generate(request({ caseMode: "upper", suffixMode: "3-digit", count: 5 }));

        expect(result.status).toBe("completed");
        for (const username of result.usernames) {
            expect(username.value).toMatch(/^[A-Z]+\d{3}$/);
            expect(username.suffix).toMatch(/^\d{3}$/);
            expect(username.value.endsWith(username.suffix ?? "missing")).toBe(true);
        }
    });

    it("rejects profane words before accepting clean ones", () => {
        const rejects: GenerationRejectEvent[] = [];
        const result = generatorCreate({ languagePolicy: "round-robin" }).generate(
            request({ count: 1, languages: ["lit", "fin"] }),
            { listener: { onReject: (event) => rejects.push(event) } }
        );

        expect(rejects).toEqual([{ reason: "profanity", language: "lit", word: "badword" }]);
        expect(result.usernames).toEqual([{ value: "kissa", language: "fin", suffix: null }]);
        expect(filter.isClean("kissa")).toBe(true);
    });

    it("rejects multi-word lemmas with a denylisted part", () => {
        const random = randomScripted([0, 0.75]);
        const rejects: GenerationRejectEvent[] = [];
        const result = generatorCreate({
            random,
            languagePolicy: "round-robin",
            vocabulary: new VocabularySource(LexiconDataset.fromWords({ cat: ["big_crap", "gran_pont"] }), { random }),
            filter: new ContentFilter(["crap"])
        }).generate(request({ count: 1, languages: ["cat"] }), {
            listener: { onReject: (event) => rejects.push(event) }
        });

        expect(rejects).toEqual([{ reason: "profanity", language: "cat", word: "big_crap" }]);
        expect(result.usernames).toEqual([{ value: "granpont", language: "cat", suffix: null }]);
    });

    it("rejects profanity regardless of case and suffix", () => {
        const result = generatorCreate().generate(
            request({ count: 1, languages: ["lit"], caseMode: "capitalized", suffixMode: "2-digit" })
        );
        expect(result.status).toBe("failed");
        expect(result.usernames).toEqual([]);
    });

    it("rejects words that are not ascii or too short", () => {
        const rejects: GenerationRejectEvent[] = [];
        const result = generatorCreate({
            random: randomScripted([0, 0.34, 0.67]),
            languagePolicy: "round-robin"
        }).generate(request({ count: 1, languages: ["nob"] }), {
            listener: { onReject: (event) => rejects.push(event) }
        });

        expect(rejects.map((event) => [event.reason, event.word])).toEqual([
            ["non_ascii", "smørbrød"],
            ["too_short", "ox"]
        ]);
        expect(result.usernames).toEqual([{ value: "fjell", language: "nob", suffix: null }]);
        expect(result.attempts).toBe(3);
    });

    it("fails with generation_exhausted and keeps the partial result", () => {
        const rejects: GenerationRejectEvent[] = [];
        const result = generatorCreate({ maxAttemptsPerSlot: 5 }).generate(request({ count: 2, languages: ["dan"] }), {
            listener: { onReject: (event) => rejects.push(event) }
        });

        expect(result.status).toBe("failed");
        if (result.status !== "failed") {
            return;
        }
        expect(result.error.kind).toBe("generation_exhausted");
        expect(result.usernames).toEqual([{ value: "hus", language: "dan", suffix: null }]);
        expect(result.attempts).toBe(6);
        expect(rejects).toHaveLength(5);
        expect(rejects.every((event) => event.reason === "duplicate")).toBe(true);
    });

    it("completes immediately for a zero count with only the terminal signal", () => {
        const listener = { onStart: vi.fn(), onAccept: vi.fn(), onReject: vi.fn(), onFinish: vi.fn() };
        const generator = generatorCreate();
        const run = generator.start(request({ count: 0, languages: ["eus"] }), listener);

        const result = run.step();

        expect(result?.status).toBe("completed");
        expect(result?.usernames).toEqual([]);
        expect(run.state).toBe("completed");
        expect(listener.onStart).not.toHaveBeenCalled();
        expect(listener.onAccept).not.toHaveBeenCalled();
        expect(listener.onReject).not.toHaveBeenCalled();
        expect(listener.onFinish).toHaveBeenCalledTimes(1);
    });

    it("fails with resource_unavailable when only unready languages are requested", () => {
        const onStart = vi.fn();
        const result = generatorCreate().generate(request({ languages: ["eus"] }), { listener: { onStart } });

        expect(result.status).toBe("failed");
        if (result.status !== "failed") {
            return;
        }
        expect(result.error.kind).toBe("resource_unavailable");
        expect(result.error.language).toBe("eus");
        expect(result.usernames).toEqual([]);
        expect(onStart).not.toHaveBeenCalled();
    });

    it("skips unready languages unless configured to abort", () => {
        const onStart = vi.fn();
        const skipped = generatorCreate().generate(request({ count: 2, languages: ["eus", "fin", "dan"] }), {
            listener: { onStart }
        });
        expect(skipped.status).toBe("completed");
        expect(skipped.usernames.map((username) => username.value).sort()).toEqual(["hus", "kissa"]);
        expect(onStart).toHaveBeenCalledWith(expect.objectContaining({ languages: ["fin", "dan"] }));

        const aborted = generatorCreate({ unavailableLanguages: "abort" }).generate(
            request({ count: 2, languages: ["fin", "eus"] })
        );
        expect(aborted.status).toBe("failed");
        if (aborted.status === "failed") {
            expect(aborted.error.language).toBe("eus");
        }
    });

    it("notifies progress after every acceptance", () => {
        const progress: number[] = [];
        generatorCreate().generate(request({ count: 4 }), {
            listener: { onAccept: (_username, event) => progress.push(event.produced) }
        });
        expect(progress).toEqual([1, 2, 3, 4]);
    });

    it("is reproducible for the same seed", () => {
        const first = generatorCreate({ random: randomSeeded(5) }).generate(request({ suffixMode: "2-digit" }));
        const second = generatorCreate({ random: randomSeeded(5) }).generate(request({ suffixMode: "2-digit" }));
        expect(second.usernames).toEqual(first.usernames);
    });

    it("returns a strict prefix when cancelled mid-run", () => {
        const full = generatorCreate({ random: randomSeeded(9) }).generate(request());

        let cancelled = false;
        const partial = generatorCreate({ random: randomSeeded(9) }).generate(request(), {
            listener: {
                onAccept: (_username, event) => {
                    cancelled = event.produced === 3;
                }
            },
            isCancelled: () => cancelled
        });

        expect(full.status).toBe("completed");
        expect(partial.status).toBe("cancelled");
        expect(partial.usernames).toEqual(full.usernames.slice(0, 3));
    });
});

describe("UsernameGenerator.generateAsync", () => {
    it("matches the synchronous result for the same seed", async () => {
        const sync = generatorCreate({ random: randomSeeded(3) }).generate(request());
        const async = await generatorCreate({ random: randomSeeded(3) }).generateAsync(request(), { batchSize: 2 });
        expect(async.usernames).toEqual(sync.usernames);
        expect(async.status).toBe("completed");
    });

    it("uses the default batch size when given one that is not a positive integer", async () => {
        const sync = generatorCreate({ random: randomSeeded(3) }).generate(request());
        for (const batchSize of [Number.NaN, 0, -4, 2.5]) {
            const result = await generatorCreate({ random: randomSeeded(3) }).generateAsync(request(), { batchSize });
            expect(result.status).toBe("completed");
            expect(result.usernames).toEqual(sync.usernames);
        }
    });

    it("cancels cooperatively through an abort signal", async () => {
        const controller = new AbortController();
        const onFinish = vi.fn();
        const result = await generatorCreate().generateAsync(request(), {
            batchSize: 1,
            signal: controller.signal,
            listener: {
                onAccept: (_username, event) => {
                    if (event.produced === 2) {
                        controller.abort();
                    }
                },
                onFinish
            }
        });

        expect(result.status).toBe("cancelled");
        expect(result.usernames).toHaveLength(2);
        expect(onFinish).toHaveBeenCalledWith(result);
    });
});
