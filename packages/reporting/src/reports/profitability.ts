import type { Deal } from '@pulseboard/core';
import type { DealProfitRow } from './types.js';

export function percentOf(value: number, base: number): number {
    return base === 0 ? 0 : (value / base) * 100;
}

/**
 * Profit and margin per deal, most profitable first. A zero-value deal has a 0% margin.
 */
export function dealProfitability(deals: Deal[]): DealProfitRow[] {
    return deals
        .map((deal) => {
            const profit = deal.dealValue - deal.costToDeliver;
            return { ...deal, profit, profitMarginPct: percentOf(profit, deal.dealValue) };
        })
        .sort((a, b) => b.profit - a.profit);
}
