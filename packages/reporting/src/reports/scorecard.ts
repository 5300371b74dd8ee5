import type { Deal, Invoice, TimeEntry } from '@pulseboard/core';
import type { TeamTargets } from '../targets/schemas.js';
import { dealProfitability, percentOf } from './profitability.js';
import { timeRecordedPerTeam } from './time.js';
import type { ScorecardRow } from './types.js';

const NO_TARGETS: TeamTargets = {
    revenueTarget: 0,
    collectionTarget: 0,
    utilizationTargetHours: 0,
    profitabilityTargetPct: 0,
};

/**
 * Per-team revenue, profit, hours and estimated collections, each compared with the team's
 * targets. Teams seen only in deals or only in time entries still get a row.
 *
 * Collections are not attributed to teams upstream, so each team's share of the total
 * collected is estimated from its share of deal revenue.
 */
export function teamScorecard(
    deals: Deal[],
    timeEntries: TimeEntry[],
    invoices: Invoice[],
    targets: Record<string, TeamTargets>
): ScorecardRow[] {
    const revenueByTeam = new Map<string, { revenue: number; profit: number }>();
    for (const deal of dealProfitability(deals)) {
        const totals = revenueByTeam.get(deal.team) ?? { revenue: 0, profit: 0 };
        totals.revenue += deal.dealValue;
        totals.profit += deal.profit;
        revenueByTeam.set(deal.team, totals);
    }

    const hoursByTeam = new Map(timeRecordedPerTeam(timeEntries).map((row) => [row.team, row]));
    const teams = [...new Set([...revenueByTeam.keys(), ...hoursByTeam.keys()])].sort();

    const totalRevenue = [...revenueByTeam.values()].reduce((sum, t) => sum + t.revenue, 0);
    const totalCollected = invoices.reduce((sum, invoice) => sum + invoice.amountPaid, 0);

    return teams
        .map((team) => {
            const { revenue, profit } = revenueByTeam.get(team) ?? { revenue: 0, profit: 0 };
            const hours = hoursByTeam.get(team)?.hours ?? 0;
            const profitabilityPct = percentOf(profit, revenue);
            const collectedEstimate =
                totalRevenue === 0 ? 0 : totalCollected * (revenue / totalRevenue);
            const target = targets[team] ?? NO_TARGETS;

            return {
                team,
                revenue,
                profit,
                profitabilityPct,
                hours,
                collectedEstimate,
                revenueVsTargetPct: percentOf(revenue, target.revenueTarget),
                collectionVsTargetPct: percentOf(collectedEstimate, target.collectionTarget),
                utilizationVsTargetPct: percentOf(hours, target.utilizationTargetHours),
                profitabilityVsTargetPct: percentOf(
                    profitabilityPct,
                    target.profitabilityTargetPct
                ),
            };
        })
        .sort((a, b) => b.revenue - a.revenue);
}
