import { describe, it, expect } from 'vitest';
import { teamScorecard } from './scorecard.js';
import { deal, invoice, timeEntry } from './test-fixtures.js';

describe('teamScorecard', () => {
    const deals = [
        deal({ team: 'Growth', dealValue: 1000, costToDeliver: 600 }),
        deal({ team: 'Growth', dealValue: 3000, costToDeliver: 1800 }),
        deal({ team: 'Delivery', dealValue: 1000, costToDeliver: 900 }),
    ];
    const entries = [
        timeEntry({ team: 'Growth', hours: 900 }),
        timeEntry({ team: 'Ops', hours: 100 }),
    ];
    const invoices = [invoice({ amountPaid: 2500 }), invoice({ date: null, amountPaid: 2500 })];
    const targets = {
        Growth: {
            revenueTarget: 8000,
            collectionTarget: 5000,
            utilizationTargetHours: 1800,
            profitabilityTargetPct: 20,
        },
    };

    it('outer-joins deal and time teams and sorts by revenue', () => {
        const rows = teamScorecard(deals, entries, invoices, targets);

        expect(rows.map((row) => row.team)).toEqual(['Growth', 'Delivery', 'Ops']);
    });

    it('measures a team against its targets', () => {
        const [growth] = teamScorecard(deals, entries, invoices, targets);

        expect(growth?.revenue).toBe(4000);
        expect(growth?.profit).toBe(1600);
        expect(growth?.profitabilityPct).toBeCloseTo(40);
        expect(growth?.hours).toBe(900);
        expect(growth?.collectedEstimate).toBeCloseTo(4000);
        expect(growth?.revenueVsTargetPct).toBeCloseTo(50);
        expect(growth?.collectionVsTargetPct).toBeCloseTo(80);
        expect(growth?.utilizationVsTargetPct).toBeCloseTo(50);
        expect(growth?.profitabilityVsTargetPct).toBeCloseTo(200);
    });

    it('zeroes comparisons for teams without targets', () => {
        const rows = teamScorecard(deals, entries, invoices, targets);
        const delivery = rows.find((row) => row.team === 'Delivery');

        expect(delivery?.collectedEstimate).toBeCloseTo(1000);
        expect(delivery?.profitabilityPct).toBeCloseTo(10);
        expect(delivery?.revenueVsTargetPct).toBe(0);
        expect(delivery?.collectionVsTargetPct).toBe(0);
        expect(delivery?.utilizationVsTargetPct).toBe(0);
        expect(delivery?.profitabilityVsTargetPct).toBe(0);
    });

    it('fills missing deal figures with zero for time-only teams', () => {
        const ops = teamScorecard(deals, entries, invoices, targets).find(
            (row) => row.team === 'Ops'
        );

        expect(ops).toEqual({
            team: 'Ops',
            revenue: 0,
            profit: 0,
            profitabilityPct: 0,
            hours: 100,
            collectedEstimate: 0,
            revenueVsTargetPct: 0,
            collectionVsTargetPct: 0,
            utilizationVsTargetPct: 0,
            profitabilityVsTargetPct: 0,
        });
    });

    it('estimates no collections when there is no revenue', () => {
        const rows = teamScorecard([], entries, invoices, {});

        expect(rows.every((row) => row.collectedEstimate === 0)).toBe(true);
    });
});
