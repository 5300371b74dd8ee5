/**
 * Plain-text formatting for terminal reports. Colour is applied by the caller.
 */

import type { ScorecardRow, Summary } from '@pulseboard/reporting';

export type Alignment = 'left' | 'right';

export function formatCurrency(value: number): string {
    const rounded = Math.round(value);
    const sign = rounded < 0 ? '-' : '';
    return `${sign}$${Math.abs(rounded).toLocaleString('en-US')}`;
}

export function formatPercent(value: number): string {
    return `${value.toFixed(1)}%`;
}

export function formatHours(hours: number): string {
    return hours.toFixed(1);
}

/**
 * Columns padded to their widest cell and separated by two spaces, with a dashed rule
 * under the header. Trailing whitespace is trimmed from every line.
 */
export function renderTable(headers: string[], rows: string[][], align: Alignment[] = []): string {
    const widths = headers.map((header, col) =>
        Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length))
    );

    const renderRow = (cells: string[]) =>
        widths
            .map((width, col) => {
                const cell = cells[col] ?? '';
                return align[col] === 'right' ? cell.padStart(width) : cell.padEnd(width);
            })
            .join('  ')
            .trimEnd();

    return [
        renderRow(headers),
        widths.map((width) => '-'.repeat(width)).join('  '),
        ...rows.map(renderRow),
    ].join('\n');
}

export function formatSummaryLines(summary: Summary): string[] {
    const source =
        summary.source === 'live'
            ? 'live'
            : `demo${summary.fallbackReason ? ` (${summary.fallbackReason})` : ''}`;
    return [
        `Data source:         ${source}`,
        `Total billed:        ${formatCurrency(summary.totalBilled)}`,
        `Money collected:     ${formatCurrency(summary.moneyCollected)}`,
        `Total hours:         ${formatHours(summary.totalHours)}`,
        `Average deal margin: ${formatPercent(summary.averageDealMargin)}`,
    ];
}

export function formatScorecardTable(rows: ScorecardRow[]): string {
    const headers = [
        'Team',
        'Revenue',
        'Profit',
        'Margin',
        'Hours',
        'Collected (est.)',
        'Revenue %',
        'Collection %',
        'Utilization %',
        'Profitability %',
    ];
    const body = rows.map((row) => [
        row.team,
        formatCurrency(row.revenue),
        formatCurrency(row.profit),
        formatPercent(row.profitabilityPct),
        formatHours(row.hours),
        formatCurrency(row.collectedEstimate),
        formatPercent(row.revenueVsTargetPct),
        formatPercent(row.collectionVsTargetPct),
        formatPercent(row.utilizationVsTargetPct),
        formatPercent(row.profitabilityVsTargetPct),
    ]);
    return renderTable(headers, body, ['left', ...headers.slice(1).map((): Alignment => 'right')]);
}
