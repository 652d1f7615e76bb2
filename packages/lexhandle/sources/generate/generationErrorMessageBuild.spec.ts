import { describe, expect, it } from "vitest";

import { GenerationError, generationErrorIs } from "./generationError.js";
import { generationErrorMessageBuild } from "./generationErrorMessageBuild.js";

describe("generationErrorMessageBuild", () => {
    it("names the unavailable language", () => {
        const error = new GenerationError("resource_unavailable", "missing", { language: "lit", details: "ENOENT" });
        expect(generationErrorMessageBuild(error, 0, 5)).toBe("No word list is available for Lithuanian (lit).");
    });

    it("reports partial counts when exhausted", () => {
        const error = new GenerationError("generation_exhausted", "exhausted");
        expect(generationErrorMessageBuild(error, 3, 10)).toBe(
            "Only 3 of 10 usernames could be generated. Try more languages, a longer suffix or a smaller count."
        );
    });

    it("keeps internal details out of the message", () => {
        const error = new GenerationError("resource_unavailable", "missing", { details: "/secret/path" });
        expect(generationErrorMessageBuild(error, 0, 1)).toBe("No word list is available for any requested language.");
    });
});

describe("generationErrorIs", () => {
    it("narrows by kind", () => {
        const error = new GenerationError("non_ascii_word", "bad");
        expect(generationErrorIs(error)).toBe(true);
        expect(generationErrorIs(error, "non_ascii_word")).toBe(true);
        expect(generationErrorIs(error, "word_too_short")).toBe(false);
        expect(generationErrorIs(new Error("x"))).toBe(false);
    });
});
