import { randomIntBelow } from "../random/randomIntBelow.js";
import type { RandomSource, SuffixMode } from "../types.js";

const SUFFIX_WIDTHS: Record<SuffixMode, number> = {
    none: 0,
    "1-digit": 1,
    "2-digit": 2,
    "3-digit": 3
};

export function suffixWidth(mode: SuffixMode): number {
    return SUFFIX_WIDTHS[mode];
}

/**
 * Draws a zero padded numeric suffix of the width selected by mode.
 * Returns: null for "none", otherwise e.g. "07" for "2-digit".
 */
export function suffixGenerate(mode: SuffixMode, random: RandomSource): string | null {
    const width = SUFFIX_WIDTHS[mode];
    if (width === 0) {
        return null;
    }
    return String(randomIntBelow(random, 10 ** width)).padStart(width, "0");
}
