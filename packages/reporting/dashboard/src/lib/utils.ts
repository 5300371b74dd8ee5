/**
 * Formatting and shaping helpers for the dashboard
 */
import type { DealProfitRow, HealthStatus, TeamTargets, TeamTimeRow } from './types.js';

/** Value shape recharts hands to tooltip formatters */
export type ChartValue = number | string | Array<number | string>;

/**
 * Format large numbers with K/M/B suffixes
 */
export function formatNumber(num: number): string {
    const abs = Math.abs(num);
    if (abs >= 1_000_000_000) {
        return `${(num / 1_000_000_000).toFixed(1)}B`;
    }
    if (abs >= 1_000_000) {
        return `${(num / 1_000_000).toFixed(1)}M`;
    }
    if (abs >= 1_000) {
        return `${(num / 1_000).toFixed(1)}K`;
    }
    return num.toString();
}

/**
 * Whole-dollar amount with thousands separators, e.g. `$1,234` or `-$50`
 */
export function formatCurrency(value: number): string {
    const rounded = Math.round(value);
    const sign = rounded < 0 ? '-' : '';
    return `${sign}$${Math.abs(rounded).toLocaleString('en-US')}`;
}

/**
 * Percentage that is already scaled to 0-100
 */
export function formatPercent(value: number, decimals: number = 1): string {
    return `${value.toFixed(decimals)}%`;
}

export function formatHours(hours: number): string {
    return `${hours.toLocaleString('en-US', { maximumFractionDigits: 1 })} h`;
}

export function formatChartCurrency(value: ChartValue): string {
    return typeof value === 'number' ? formatCurrency(value) : String(value);
}

/**
 * Format an ISO timestamp relative to `now` (e.g. "2h ago")
 */
export function formatRelativeTime(iso: string, now: number = Date.now()): string {
    const diff = Math.max(0, now - new Date(iso).getTime());

    const seconds = Math.floor(diff / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) {
        return `${days}d ago`;
    }
    if (hours > 0) {
        return `${hours}h ago`;
    }
    if (minutes > 0) {
        return `${minutes}m ago`;
    }
    return `${seconds}s ago`;
}

/**
 * One-line description of the loaded dataset for the header, e.g.
 * `100 deals · 2,000 time entries · 300 invoices · loaded 5m ago`
 */
export function describeDataset(health: HealthStatus, now: number = Date.now()): string {
    const { deals, timeEntries, invoices } = health.counts;
    return [
        `${deals.toLocaleString('en-US')} deals`,
        `${timeEntries.toLocaleString('en-US')} time entries`,
        `${invoices.toLocaleString('en-US')} invoices`,
        `loaded ${formatRelativeTime(health.loadedAt, now)}`,
    ].join(' · ');
}

export function toDonutData(rows: TeamTimeRow[]): { name: string; value: number }[] {
    return rows.filter((row) => row.hours > 0).map((row) => ({ name: row.team, value: row.hours }));
}

export interface DealPoint {
    dealName: string;
    dealValue: number;
    profit: number;
    /** Sizes the point */
    costToDeliver: number;
}

/**
 * One scatter series per team, teams in alphabetical order
 */
export function scatterSeriesByTeam(
    deals: DealProfitRow[]
): { team: string; points: DealPoint[] }[] {
    const byTeam = new Map<string, DealPoint[]>();
    for (const deal of deals) {
        const points = byTeam.get(deal.team) ?? [];
        points.push({
            dealName: deal.dealName,
            dealValue: deal.dealValue,
            profit: deal.profit,
            costToDeliver: deal.costToDeliver,
        });
        byTeam.set(deal.team, points);
    }
    return [...byTeam.keys()]
        .sort()
        .map((team) => ({ team, points: byTeam.get(team) ?? [] }));
}

export const TARGET_FIELDS: { key: keyof TeamTargets; label: string }[] = [
    { key: 'revenueTarget', label: 'Revenue target ($)' },
    { key: 'collectionTarget', label: 'Collection target ($)' },
    { key: 'utilizationTargetHours', label: 'Utilization target (hours)' },
    { key: 'profitabilityTargetPct', label: 'Profitability target (%)' },
];

/**
 * Fields of a targets form that changed, parsed to numbers.
 * Returns an error message instead when a field is blank, negative or not a number.
 */
export function diffTargets(
    current: TeamTargets,
    draft: Record<keyof TeamTargets, string>
): { update: Partial<TeamTargets> } | { error: string } {
    const update: Partial<TeamTargets> = {};
    for (const { key, label } of TARGET_FIELDS) {
        const raw = draft[key].trim();
        const value = Number(raw);
        if (raw === '' || !Number.isFinite(value) || value < 0) {
            return { error: `${label} must be a number of at least 0` };
        }
        if (value !== current[key]) {
            update[key] = value;
        }
    }
    return { update };
}

export function targetsToDraft(targets: TeamTargets): Record<keyof TeamTargets, string> {
    return {
        revenueTarget: String(targets.revenueTarget),
        collectionTarget: String(targets.collectionTarget),
        utilizationTargetHours: String(targets.utilizationTargetHours),
        profitabilityTargetPct: String(targets.profitabilityTargetPct),
    };
}

/**
 * Class name merger (simple version)
 */
export function cn(...classes: (string | undefined | null | false)[]): string {
    return classes.filter(Boolean).join(' ');
}
