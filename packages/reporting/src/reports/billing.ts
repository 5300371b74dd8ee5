import { monthKey, yearOf, type Invoice } from '@pulseboard/core';
import type { MonthlyBillingRow, YearlyBillingRow } from './types.js';

interface BillingTotals {
    totalBilled: number;
    amountCollected: number;
    outstanding: number;
}

function groupBilling<K extends string | number>(
    invoices: Invoice[],
    keyOf: (date: string) => K
): Map<K, BillingTotals> {
    const groups = new Map<K, BillingTotals>();
    for (const invoice of invoices) {
        // Undated invoices cannot be placed in a period
        if (invoice.date === null) continue;

        const key = keyOf(invoice.date);
        const totals = groups.get(key) ?? { totalBilled: 0, amountCollected: 0, outstanding: 0 };
        totals.totalBilled += invoice.total;
        totals.amountCollected += invoice.amountPaid;
        totals.outstanding += invoice.amountDue;
        groups.set(key, totals);
    }
    return groups;
}

/**
 * Billed, collected and outstanding amounts per calendar month, oldest first.
 */
export function monthlyBilling(invoices: Invoice[]): MonthlyBillingRow[] {
    return [...groupBilling(invoices, monthKey)]
        .map(([month, totals]) => ({ month, ...totals }))
        .sort((a, b) => a.month.localeCompare(b.month));
}

/**
 * Billed, collected and outstanding amounts per calendar year, oldest first.
 */
export function yearlyBilling(invoices: Invoice[]): YearlyBillingRow[] {
    return [...groupBilling(invoices, yearOf)]
        .map(([year, totals]) => ({ year, ...totals }))
        .sort((a, b) => a.year - b.year);
}
