import type { Dataset } from '@pulseboard/core';
import { dealProfitability } from './profitability.js';
import type { Summary } from './types.js';

export const DEFAULT_PREVIEW_LIMIT = 100;

/**
 * Headline figures for the top of the dashboard.
 */
export function summarize(dataset: Dataset): Summary {
    const margins = dealProfitability(dataset.deals).map((deal) => deal.profitMarginPct);
    const averageDealMargin =
        margins.length === 0 ? 0 : margins.reduce((sum, m) => sum + m, 0) / margins.length;

    return {
        totalBilled: dataset.invoices.reduce((sum, invoice) => sum + invoice.total, 0),
        moneyCollected: dataset.invoices.reduce((sum, invoice) => sum + invoice.amountPaid, 0),
        totalHours: dataset.timeEntries.reduce((sum, entry) => sum + entry.hours, 0),
        averageDealMargin,
        source: dataset.source,
        loadedAt: dataset.loadedAt,
        ...(dataset.fallbackReason !== undefined && { fallbackReason: dataset.fallbackReason }),
    };
}

/**
 * Every team that appears in deals or time entries, alphabetically.
 */
export function listTeams(dataset: Pick<Dataset, 'deals' | 'timeEntries'>): string[] {
    const teams = new Set<string>();
    for (const deal of dataset.deals) teams.add(deal.team);
    for (const entry of dataset.timeEntries) teams.add(entry.team);
    return [...teams].sort();
}

export function previewRows<T>(rows: readonly T[], limit: number = DEFAULT_PREVIEW_LIMIT): T[] {
    return rows.slice(0, Math.max(0, limit));
}
