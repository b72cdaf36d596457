/**
 * Random Source Contract
 *
 * Exploration jitter and seeded catalog generation draw from an injected
 * source so that tests and replays can pin their output.
 */

/**
 * Returns a float in [0, 1) on every call.
 */
export type RandomSource = () => number;

/**
 * Live entropy source for production requests.
 */
export const systemRandom: RandomSource = () => Math.random();

/**
 * Mulberry32 - fast deterministic PRNG.
 *
 * The same seed always yields the same sequence.
 *
 * @param seed - 32-bit integer seed
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Uniform integer in [min, max], both inclusive.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
    return min + Math.floor(random() * (max - min + 1));
}

/**
 * Pick one element uniformly.
 *
 * @throws Error if the list is empty
 */
export function randomChoice<T>(random: RandomSource, items: readonly T[]): T {
    if (items.length === 0) {
        throw new Error("Cannot choose from an empty list");
    }
    return items[Math.floor(random() * items.length)];
}

/**
 * Pick `count` distinct elements, in draw order (partial Fisher-Yates).
 */
export function randomSample<T>(random: RandomSource, items: readonly T[], count: number): T[] {
    const pool = [...items];
    const take = Math.min(count, pool.length);

    for (let i = 0; i < take; i++) {
        const j = i + Math.floor(random() * (pool.length - i));
        [pool[i], pool[j]] = [pool[j], pool[i]];
    }

    return pool.slice(0, take);
}
