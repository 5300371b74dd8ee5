import { describe, it, expect } from 'vitest';
import {
    diffTargets,
    formatCurrency,
    formatHours,
    formatNumber,
    formatPercent,
    formatRelativeTime,
    describeDataset,
    scatterSeriesByTeam,
    targetsToDraft,
    toDonutData,
} from './utils.js';
import type { DealProfitRow, TeamTargets } from './types.js';

function profitRow(dealName: string, team: string, dealValue: number, cost: number): DealProfitRow {
    return {
        dealName,
        team,
        closeDate: '2024-03-01',
        dealValue,
        costToDeliver: cost,
        profit: dealValue - cost,
        profitMarginPct: ((dealValue - cost) / dealValue) * 100,
    };
}

const targets: TeamTargets = {
    revenueTarget: 250000,
    collectionTarget: 200000,
    utilizationTargetHours: 1800,
    profitabilityTargetPct: 35,
};

describe('formatters', () => {
    it('abbreviates large numbers', () => {
        expect(formatNumber(999)).toBe('999');
        expect(formatNumber(1500)).toBe('1.5K');
        expect(formatNumber(2_500_000)).toBe('2.5M');
        expect(formatNumber(-1500)).toBe('-1.5K');
    });

    it('formats whole-dollar amounts', () => {
        expect(formatCurrency(1234567.8)).toBe('$1,234,568');
        expect(formatCurrency(-50.4)).toBe('-$50');
        expect(formatCurrency(0)).toBe('$0');
    });

    it('formats percentages that are already scaled', () => {
        expect(formatPercent(12.345)).toBe('12.3%');
        expect(formatPercent(50, 0)).toBe('50%');
    });

    it('formats hours with one decimal', () => {
        expect(formatHours(1234.56)).toBe('1,234.6 h');
    });

    it('formats timestamps relative to now', () => {
        const now = Date.parse('2024-06-30T12:30:00.000Z');

        expect(formatRelativeTime('2024-06-30T10:00:00.000Z', now)).toBe('2h ago');
        expect(formatRelativeTime('2024-06-28T12:30:00.000Z', now)).toBe('2d ago');
        expect(formatRelativeTime('2024-06-30T13:00:00.000Z', now)).toBe('0s ago');
    });
});

describe('describeDataset', () => {
    it('summarizes row counts and load time', () => {
        const now = Date.parse('2024-06-30T12:00:00.000Z');

        const text = describeDataset(
            {
                ok: true,
                source: 'demo',
                loadedAt: '2024-06-30T11:55:00.000Z',
                counts: { deals: 100, timeEntries: 2000, invoices: 300 },
            },
            now
        );

        expect(text).toBe('100 deals · 2,000 time entries · 300 invoices · loaded 5m ago');
    });
});

describe('chart data', () => {
    it('drops teams without hours from the donut', () => {
        const data = toDonutData([
            { team: 'Growth', hours: 12.5, billableAmount: 900 },
            { team: 'Ops', hours: 0, billableAmount: 0 },
        ]);

        expect(data).toEqual([{ name: 'Growth', value: 12.5 }]);
    });

    it('groups deals into one scatter series per team', () => {
        const series = scatterSeriesByTeam([
            profitRow('Deal-2', 'Growth', 5000, 1000),
            profitRow('Deal-1', 'Delivery', 9000, 4000),
            profitRow('Deal-3', 'Growth', 3000, 3500),
        ]);

        expect(series).toEqual([
            {
                team: 'Delivery',
                points: [
                    { dealName: 'Deal-1', dealValue: 9000, profit: 5000, costToDeliver: 4000 },
                ],
            },
            {
                team: 'Growth',
                points: [
                    { dealName: 'Deal-2', dealValue: 5000, profit: 4000, costToDeliver: 1000 },
                    { dealName: 'Deal-3', dealValue: 3000, profit: -500, costToDeliver: 3500 },
                ],
            },
        ]);
    });
});

describe('targets form', () => {
    it('returns only the fields that changed', () => {
        const draft = { ...targetsToDraft(targets), revenueTarget: ' 300000 ' };

        expect(diffTargets(targets, draft)).toEqual({ update: { revenueTarget: 300000 } });
    });

    it('returns an empty update when nothing changed', () => {
        expect(diffTargets(targets, targetsToDraft(targets))).toEqual({ update: {} });
    });

    it('rejects blank and negative values', () => {
        expect(diffTargets(targets, { ...targetsToDraft(targets), collectionTarget: '' })).toEqual({
            error: 'Collection target ($) must be a number of at least 0',
        });
        expect(
            diffTargets(targets, { ...targetsToDraft(targets), profitabilityTargetPct: '-5' })
        ).toEqual({ error: 'Profitability target (%) must be a number of at least 0' });
    });
});
