import type { RandomSource } from "../types.js";

/**
 * Draws a uniform integer in [0, bound).
 * Expects: bound is a positive integer.
 */
export function randomIntBelow(random: RandomSource, bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
        throw new Error(`Random bound must be a positive integer, got ${bound}`);
    }
    const value = Math.floor(random() * bound);
    return Math.min(Math.max(value, 0), bound - 1);
}
