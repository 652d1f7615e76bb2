import type { RandomSource } from "../types.js";

/**
 * Creates a deterministic random source (mulberry32) from an integer seed.
 * Expects: seed is a finite number; only its low 32 bits are used.
 */
export function randomSeeded(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let value = state;
        value = Math.imul(value ^ (value >>> 15), value | 1);
        value ^= value + Math.imul(value ^ (value >>> 7), value | 61);
        return ((value ^ (value >>> 14)) >>> 0) / 4294967296;
    };
}
