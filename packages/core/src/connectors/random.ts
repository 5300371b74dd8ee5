/**
 * Small deterministic PRNG (mulberry32) so demo data is stable across runs and in tests.
 */
export interface RandomSource {
    /** Uniform float in [0, 1) */
    next(): number;
    /** Integer in [min, max) */
    integer(min: number, max: number): number;
    /** Float in [min, max) */
    uniform(min: number, max: number): number;
    choice<T>(items: readonly T[]): T;
    weightedChoice<T>(items: readonly T[], weights: readonly number[]): T;
}

export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;

    const next = (): number => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };

    const pick = <T>(items: readonly T[], index: number): T => {
        const item = items[index];
        if (item === undefined) {
            throw new RangeError(`Cannot pick index ${index} from ${items.length} items`);
        }
        return item;
    };

    return {
        next,
        integer: (min, max) => min + Math.floor(next() * (max - min)),
        uniform: (min, max) => min + next() * (max - min),
        choice: (items) => pick(items, Math.floor(next() * items.length)),
        weightedChoice: (items, weights) => {
            if (items.length !== weights.length) {
                throw new RangeError('items and weights must have the same length');
            }
            const total = weights.reduce((sum, w) => sum + w, 0);
            let roll = next() * total;
            for (let i = 0; i < items.length; i++) {
                roll -= weights[i] ?? 0;
                if (roll < 0) {
                    return pick(items, i);
                }
            }
            return pick(items, items.length - 1);
        },
    };
}
