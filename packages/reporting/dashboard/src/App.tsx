import { useMemo, useState } from 'react';
import { Clock, DollarSign, TrendingUp, Wallet } from 'lucide-react';
import {
    refreshDataset,
    useHealth,
    useMonthlyBilling,
    useProfitability,
    useScorecard,
    useSummary,
    useTargets,
    useTimeByTeam,
    useYearlyBilling,
} from './lib/hooks.js';
import { Layout } from './components/Layout.js';
import { Card } from './components/Card.js';
import { StatCard } from './components/StatCard.js';
import { ErrorState, Loading } from './components/Loading.js';
import { BarChart } from './components/charts/BarChart.js';
import { DonutChart } from './components/charts/DonutChart.js';
import { ScatterChart } from './components/charts/ScatterChart.js';
import { ScorecardTable } from './components/ScorecardTable.js';
import { TargetsPanel } from './components/TargetsPanel.js';
import { RawDataPanel } from './components/RawDataPanel.js';
import { chartColors } from './lib/theme.js';
import {
    formatChartCurrency,
    formatCurrency,
    formatHours,
    formatNumber,
    formatPercent,
    scatterSeriesByTeam,
    toDonutData,
    type ChartValue,
} from './lib/utils.js';
import type { MonthlyBillingRow, Summary, YearlyBillingRow } from './lib/types.js';

const billingKeys = [
    { key: 'totalBilled', name: 'Billed', color: chartColors.billed },
    { key: 'amountCollected', name: 'Collected', color: chartColors.collected },
    { key: 'outstanding', name: 'Outstanding', color: chartColors.outstanding },
] as const;

function collectedShare(summary: Summary): string | undefined {
    if (summary.totalBilled <= 0) {
        return undefined;
    }
    return `${formatPercent((summary.moneyCollected / summary.totalBilled) * 100)} of billed`;
}

export function App() {
    const [reloadKey, setReloadKey] = useState(0);
    const [refreshing, setRefreshing] = useState(false);
    const [refreshError, setRefreshError] = useState<Error | null>(null);

    const health = useHealth(reloadKey);
    const summary = useSummary(reloadKey);
    const monthly = useMonthlyBilling(reloadKey);
    const yearly = useYearlyBilling(reloadKey);
    const timeByTeam = useTimeByTeam(reloadKey);
    const profitability = useProfitability(reloadKey);
    const scorecard = useScorecard(reloadKey);
    const targets = useTargets(reloadKey);

    const donutData = useMemo(() => toDonutData(timeByTeam.data?.data ?? []), [timeByTeam.data]);
    const scatterSeries = useMemo(
        () => scatterSeriesByTeam(profitability.data?.data ?? []),
        [profitability.data]
    );

    async function refresh() {
        setRefreshing(true);
        setRefreshError(null);
        try {
            await refreshDataset();
            setReloadKey((key) => key + 1);
        } catch (err) {
            setRefreshError(err instanceof Error ? err : new Error('Refresh failed'));
        } finally {
            setRefreshing(false);
        }
    }

    const headline = summary.data?.data;

    return (
        <Layout
            summary={headline}
            health={health.data ?? undefined}
            refreshing={refreshing}
            onRefresh={() => void refresh()}
        >
            {refreshError && <ErrorState error={refreshError} />}
            {headline?.fallbackReason && (
                <p className="mb-6 rounded-md bg-amber-50 px-4 py-3 text-sm text-amber-800">
                    Showing demo data: {headline.fallbackReason}
                </p>
            )}

            <div className="space-y-6">
                {summary.loading && !headline && <Loading text="Loading summary..." />}
                {summary.error && <ErrorState error={summary.error} />}
                {headline && (
                    <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-4 gap-6">
                        <StatCard
                            label="Total billed"
                            value={formatCurrency(headline.totalBilled)}
                            icon={<DollarSign className="w-6 h-6" />}
                        />
                        <StatCard
                            label="Money collected"
                            value={formatCurrency(headline.moneyCollected)}
                            hint={collectedShare(headline)}
                            icon={<Wallet className="w-6 h-6" />}
                        />
                        <StatCard
                            label="Total hours"
                            value={formatHours(headline.totalHours)}
                            icon={<Clock className="w-6 h-6" />}
                        />
                        <StatCard
                            label="Average deal margin"
                            value={formatPercent(headline.averageDealMargin)}
                            icon={<TrendingUp className="w-6 h-6" />}
                        />
                    </div>
                )}

                <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
                    <Card title="Monthly billing" description="Billed, collected and outstanding">
                        {monthly.error && <ErrorState error={monthly.error} />}
                        {monthly.loading && !monthly.data ? (
                            <Loading />
                        ) : (
                            <BarChart<MonthlyBillingRow>
                                data={monthly.data?.data.rows ?? []}
                                xKey="month"
                                dataKeys={[...billingKeys]}
                                formatYAxis={formatNumber}
                                formatTooltip={formatChartCurrency}
                            />
                        )}
                    </Card>
                    <Card title="Yearly billing">
                        {yearly.error && <ErrorState error={yearly.error} />}
                        {yearly.loading && !yearly.data ? (
                            <Loading />
                        ) : (
                            <BarChart<YearlyBillingRow>
                                data={yearly.data?.data.rows ?? []}
                                xKey="year"
                                dataKeys={[...billingKeys]}
                                formatYAxis={formatNumber}
                                formatTooltip={formatChartCurrency}
                            />
                        )}
                    </Card>
                </div>

                <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
                    <Card title="Time recorded per team">
                        {timeByTeam.error && <ErrorState error={timeByTeam.error} />}
                        {timeByTeam.loading && !timeByTeam.data ? (
                            <Loading />
                        ) : (
                            <DonutChart
                                data={donutData}
                                formatTooltip={(value: ChartValue) =>
                                    typeof value === 'number' ? formatHours(value) : String(value)
                                }
                            />
                        )}
                    </Card>
                    <Card title="Deal profitability" description="Deal value against profit">
                        {profitability.error && <ErrorState error={profitability.error} />}
                        {profitability.loading && !profitability.data ? (
                            <Loading />
                        ) : (
                            <ScatterChart series={scatterSeries} />
                        )}
                    </Card>
                </div>

                <Card
                    title="Team scorecard"
                    description="Actuals measured against each team's targets"
                >
                    {scorecard.error && <ErrorState error={scorecard.error} />}
                    {scorecard.loading && !scorecard.data ? (
                        <Loading />
                    ) : (
                        <ScorecardTable rows={scorecard.data?.data ?? []} />
                    )}
                </Card>

                <Card title="Targets">
                    {targets.error && <ErrorState error={targets.error} />}
                    {targets.data && (
                        <TargetsPanel
                            targets={targets.data.data}
                            onSaved={() => setReloadKey((key) => key + 1)}
                        />
                    )}
                </Card>

                <Card title="Raw data">
                    <RawDataPanel reloadKey={reloadKey} />
                </Card>
            </div>
        </Layout>
    );
}
