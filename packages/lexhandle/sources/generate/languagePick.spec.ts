import { describe, expect, it } from "vitest";

import { languagePick } from "./languagePick.js";

describe("languagePick", () => {
    it("cycles through languages in request order", () => {
        const picks = [0, 1, 2, 3, 4].map((attempt) => languagePick(["eng", "fra", "spa"], "round-robin", () => 0, attempt));
        expect(picks).toEqual(["eng", "fra", "spa", "eng", "fra"]);
    });

    it("draws uniformly from the random source", () => {
        expect(languagePick(["eng", "fra", "spa"], "random", () => 0.7, 0)).toBe("spa");
        expect(languagePick(["eng", "fra", "spa"], "random", () => 0.1, 5)).toBe("eng");
    });

    it("rejects an empty list", () => {
        expect(() => languagePick([], "random", () => 0, 0)).toThrow();
    });
});
