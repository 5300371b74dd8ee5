import { describe, it, expect } from 'vitest';
import type { ScorecardRow, Summary } from '@pulseboard/reporting';
import {
    formatCurrency,
    formatScorecardTable,
    formatSummaryLines,
    renderTable,
} from './formatters.js';

describe('formatCurrency', () => {
    it('rounds to whole dollars with separators', () => {
        expect(formatCurrency(1234567.6)).toBe('$1,234,568');
        expect(formatCurrency(-250)).toBe('-$250');
    });
});

describe('renderTable', () => {
    it('pads columns and right-aligns where asked', () => {
        const table = renderTable(
            ['Team', 'Hours'],
            [
                ['Growth', '10'],
                ['Ops', '5.5'],
            ],
            ['left', 'right']
        );

        expect(table.split('\n')).toEqual([
            'Team    Hours',
            '------  -----',
            'Growth     10',
            'Ops' + ' '.repeat(7) + '5.5',
        ]);
    });
});

describe('formatSummaryLines', () => {
    const summary: Summary = {
        totalBilled: 1200,
        moneyCollected: 800,
        totalHours: 15.25,
        averageDealMargin: 57.5,
        source: 'demo',
        loadedAt: '2024-06-30T12:00:00.000Z',
        fallbackReason: 'credentials missing',
    };

    it('lists the headline figures', () => {
        expect(formatSummaryLines(summary)).toEqual([
            'Data source:         demo (credentials missing)',
            'Total billed:        $1,200',
            'Money collected:     $800',
            'Total hours:         15.3',
            'Average deal margin: 57.5%',
        ]);
    });

    it('shows live data without a reason', () => {
        const { fallbackReason: _unused, ...live } = summary;
        expect(formatSummaryLines({ ...live, source: 'live' })[0]).toBe(
            'Data source:         live'
        );
    });
});

describe('formatScorecardTable', () => {
    it('renders one line per team under the header', () => {
        const row: ScorecardRow = {
            team: 'Growth',
            revenue: 125000,
            profit: 50000,
            profitabilityPct: 40,
            hours: 900,
            collectedEstimate: 100000,
            revenueVsTargetPct: 50,
            collectionVsTargetPct: 50,
            utilizationVsTargetPct: 50,
            profitabilityVsTargetPct: 114.28571428571428,
        };

        const lines = formatScorecardTable([row]).split('\n');

        expect(lines).toHaveLength(3);
        expect(lines[0]?.startsWith('Team' + ' '.repeat(5) + 'Revenue')).toBe(true);
        expect(lines[2]?.startsWith('Growth  $125,000')).toBe(true);
        expect(lines[2]?.endsWith('114.3%')).toBe(true);
    });
});
