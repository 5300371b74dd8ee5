import { Table, type Column } from './Table.js';
import { formatCurrency, formatHours, formatPercent } from '../lib/utils.js';
import type { ScorecardRow } from '../lib/types.js';

function vsTarget(value: number) {
    const tone = value >= 100 ? 'text-green-600' : value >= 75 ? 'text-amber-600' : 'text-red-600';
    return <span className={`font-medium ${tone}`}>{formatPercent(value)}</span>;
}

const columns: Column<ScorecardRow>[] = [
    { header: 'Team', accessor: 'team' },
    { header: 'Revenue', accessor: (row) => formatCurrency(row.revenue), align: 'right' },
    { header: 'Profit', accessor: (row) => formatCurrency(row.profit), align: 'right' },
    {
        header: 'Profitability',
        accessor: (row) => formatPercent(row.profitabilityPct),
        align: 'right',
    },
    { header: 'Hours', accessor: (row) => formatHours(row.hours), align: 'right' },
    {
        header: 'Collected (est.)',
        accessor: (row) => formatCurrency(row.collectedEstimate),
        align: 'right',
    },
    {
        header: 'Revenue vs target',
        accessor: (row) => vsTarget(row.revenueVsTargetPct),
        align: 'right',
    },
    {
        header: 'Collection vs target',
        accessor: (row) => vsTarget(row.collectionVsTargetPct),
        align: 'right',
    },
    {
        header: 'Utilization vs target',
        accessor: (row) => vsTarget(row.utilizationVsTargetPct),
        align: 'right',
    },
    {
        header: 'Profitability vs target',
        accessor: (row) => vsTarget(row.profitabilityVsTargetPct),
        align: 'right',
    },
];

export function ScorecardTable({ rows }: { rows: ScorecardRow[] }) {
    return <Table data={rows} columns={columns} rowKey={(row) => row.team} />;
}
