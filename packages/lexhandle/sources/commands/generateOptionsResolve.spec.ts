import { describe, expect, it } from "vitest";

import { GENERATION_DEFAULTS } from "../settings.js";
import { generateOptionsResolve } from "./generateOptionsResolve.js";

describe("generateOptionsResolve", () => {
    it("falls back to configured defaults", () => {
        const resolved = generateOptionsResolve({}, GENERATION_DEFAULTS);

        expect(resolved.request.count).toBe(40);
        expect(resolved.request.caseMode).toBe("lower");
        expect(resolved.request.suffixMode).toBe("none");
        expect(resolved.request.languages).toHaveLength(19);
        expect(resolved.languagePolicy).toBe("random");
        expect(resolved.seed).toBeNull();
        expect(resolved.json).toBe(false);
        expect(resolved.sorted).toBe(true);
    });

    it("applies flags", () => {
        const resolved = generateOptionsResolve(
            {
                count: "12",
                case: "Capitalized",
                suffix: "2-digit",
                languages: "fra,spa",
                policy: "round-robin",
                seed: "77",
                json: true,
                unsorted: true
            },
            GENERATION_DEFAULTS
        );

        expect(resolved.request).toEqual({
            count: 12,
            caseMode: "capitalized",
            suffixMode: "2-digit",
            languages: ["fra", "spa"]
        });
        expect(resolved.languagePolicy).toBe("round-robin");
        expect(resolved.seed).toBe(77);
        expect(resolved.json).toBe(true);
        expect(resolved.sorted).toBe(false);
    });

    it("names the flag on invalid values", () => {
        expect(() => generateOptionsResolve({ count: "ten" }, GENERATION_DEFAULTS)).toThrow(
            'Invalid --count "ten": expected an integer of at least 0'
        );
        expect(() => generateOptionsResolve({ suffix: "4-digit" }, GENERATION_DEFAULTS)).toThrow(
            'Invalid --suffix "4-digit": expected one of none, 1-digit, 2-digit, 3-digit'
        );
        expect(() => generateOptionsResolve({ languages: "eng,klingon" }, GENERATION_DEFAULTS)).toThrow(
            'Invalid --languages "eng,klingon": Unknown language "klingon"'
        );
    });

    it("accepts a zero count", () => {
        expect(generateOptionsResolve({ count: "0" }, GENERATION_DEFAULTS).request.count).toBe(0);
    });
});
