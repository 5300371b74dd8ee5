import { describe, it, expect } from 'vitest';
import { createSeededRandom } from './random.js';

describe('createSeededRandom', () => {
    it('repeats the same sequence for the same seed', () => {
        const a = createSeededRandom(7);
        const b = createSeededRandom(7);

        const first = Array.from({ length: 5 }, () => a.next());
        const second = Array.from({ length: 5 }, () => b.next());

        expect(first).toEqual(second);
    });

    it('keeps integers inside the half-open range', () => {
        const rng = createSeededRandom(1);

        for (let i = 0; i < 500; i++) {
            const value = rng.integer(3, 6);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(3);
            expect(value).toBeLessThan(6);
        }
    });

    it('never picks an item with zero weight', () => {
        const rng = createSeededRandom(3);

        for (let i = 0; i < 100; i++) {
            expect(rng.weightedChoice(['never', 'always'], [0, 1])).toBe('always');
        }
    });

    it('throws when choosing from an empty list', () => {
        const rng = createSeededRandom(3);

        expect(() => rng.choice([])).toThrow('Cannot pick index 0 from 0 items');
    });

    it('throws when weights do not line up with items', () => {
        const rng = createSeededRandom(3);

        expect(() => rng.weightedChoice(['a', 'b'], [1])).toThrow(
            'items and weights must have the same length'
        );
    });
});
