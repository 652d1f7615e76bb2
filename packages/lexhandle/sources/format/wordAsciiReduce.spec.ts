import { describe, expect, it } from "vitest";

import { wordAsciiReduce } from "./wordAsciiReduce.js";

describe("wordAsciiReduce", () => {
    it("keeps plain ascii words", () => {
        expect(wordAsciiReduce("lantern")).toBe("lantern");
        expect(wordAsciiReduce("Route66")).toBe("Route66");
    });

    it("strips diacritics", () => {
        expect(wordAsciiReduce("café")).toBe("cafe");
        expect(wordAsciiReduce("señal")).toBe("senal");
        expect(wordAsciiReduce("ñandú")).toBe("nandu");
    });

    it("joins multi-word lemmas", () => {
        expect(wordAsciiReduce("ice_cream")).toBe("icecream");
        expect(wordAsciiReduce("Saint-Étienne")).toBe("SaintEtienne");
        expect(wordAsciiReduce("o'clock")).toBe("oclock");
        expect(wordAsciiReduce(" hot  dog ")).toBe("hotdog");
    });

    it("rejects letters without an ascii decomposition", () => {
        expect(wordAsciiReduce("straße")).toBeNull();
        expect(wordAsciiReduce("smørbrød")).toBeNull();
        expect(wordAsciiReduce("łódź")).toBeNull();
    });

    it("returns an empty string for separators only", () => {
        expect(wordAsciiReduce("_-_")).toBe("");
    });
});
