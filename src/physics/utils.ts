/**
 * Common utility functions shared across the codebase.
 */
import type { RandomSource } from './types';

/**
 * Deterministic linear congruential generator (Numerical Recipes constants).
 * Same seed, same sequence; values in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = Math.floor(seed) >>> 0;
    return () => {
        state = (state * 1664525 + 1013904223) % 4294967296;
        return state / 4294967296;
    };
}
