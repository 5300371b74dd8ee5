import { describe, it, expect } from 'vitest';
import { dealProfitability, percentOf } from './profitability.js';
import { deal } from './test-fixtures.js';

describe('dealProfitability', () => {
    it('computes profit and margin and sorts by profit', () => {
        const rows = dealProfitability([
            deal({ dealName: 'X', dealValue: 1000, costToDeliver: 600 }),
            deal({ dealName: 'Y', dealValue: 0, costToDeliver: 100 }),
            deal({ dealName: 'Z', dealValue: 2000, costToDeliver: 500 }),
        ]);

        expect(rows.map((row) => row.dealName)).toEqual(['Z', 'X', 'Y']);
        expect(rows.map((row) => row.profit)).toEqual([1500, 400, -100]);
        expect(rows.map((row) => row.profitMarginPct)).toEqual([75, 40, 0]);
    });
});

describe('percentOf', () => {
    it('is zero against a zero base', () => {
        expect(percentOf(10, 0)).toBe(0);
        expect(percentOf(1, 4)).toBe(25);
    });
});
