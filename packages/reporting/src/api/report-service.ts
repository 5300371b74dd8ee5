import { logger, type Dataset, type Deal, type Invoice, type TimeEntry } from '@pulseboard/core';
import {
    dealProfitability,
    listTeams,
    monthlyBilling,
    previewRows,
    summarize,
    teamScorecard,
    timeRecordedPerTeam,
    yearlyBilling,
    type DealProfitRow,
    type MonthlyBillingRow,
    type ScorecardRow,
    type Summary,
    type TeamTimeRow,
    type YearlyBillingRow,
} from '../reports/index.js';
import type { TargetsStore } from '../targets/store.js';
import type { TeamTargets } from '../targets/schemas.js';
import { ReportError } from './errors.js';

export interface DatasetLoader {
    loadData(): Promise<Dataset>;
}

export const RAW_TABLES = ['deals', 'time-entries', 'invoices'] as const;
export type RawTable = (typeof RAW_TABLES)[number];

export function isRawTable(value: string): value is RawTable {
    return (RAW_TABLES as readonly string[]).includes(value);
}

export type BillingPeriod = 'month' | 'year';

export interface DatasetStatus {
    source: Dataset['source'];
    loadedAt: string;
    counts: { deals: number; timeEntries: number; invoices: number };
}

/**
 * Holds the current dataset and derives every report from it.
 * The dataset loads on first use and again on `refresh()`; concurrent callers share one load.
 */
export class ReportService {
    private dataset: Dataset | null = null;
    private pending: Promise<Dataset> | null = null;

    constructor(
        private readonly loader: DatasetLoader,
        private readonly targets: TargetsStore
    ) {}

    async getDataset(): Promise<Dataset> {
        if (this.dataset) {
            return this.dataset;
        }
        return this.load();
    }

    async refresh(): Promise<Dataset> {
        logger.info('Refreshing dataset');
        return this.load();
    }

    async status(): Promise<DatasetStatus> {
        const dataset = await this.getDataset();
        return {
            source: dataset.source,
            loadedAt: dataset.loadedAt,
            counts: {
                deals: dataset.deals.length,
                timeEntries: dataset.timeEntries.length,
                invoices: dataset.invoices.length,
            },
        };
    }

    async summary(): Promise<Summary> {
        return summarize(await this.getDataset());
    }

    async billing(period: 'month'): Promise<MonthlyBillingRow[]>;
    async billing(period: 'year'): Promise<YearlyBillingRow[]>;
    async billing(period: BillingPeriod): Promise<MonthlyBillingRow[] | YearlyBillingRow[]>;
    async billing(period: BillingPeriod): Promise<MonthlyBillingRow[] | YearlyBillingRow[]> {
        const { invoices } = await this.getDataset();
        return period === 'month' ? monthlyBilling(invoices) : yearlyBilling(invoices);
    }

    async timeByTeam(): Promise<TeamTimeRow[]> {
        return timeRecordedPerTeam((await this.getDataset()).timeEntries);
    }

    async profitability(): Promise<DealProfitRow[]> {
        return dealProfitability((await this.getDataset()).deals);
    }

    async teams(): Promise<string[]> {
        return listTeams(await this.getDataset());
    }

    async resolvedTargets(): Promise<Record<string, TeamTargets>> {
        return this.targets.resolve(await this.teams());
    }

    async scorecard(): Promise<ScorecardRow[]> {
        const dataset = await this.getDataset();
        const targets = this.targets.resolve(listTeams(dataset));
        return teamScorecard(dataset.deals, dataset.timeEntries, dataset.invoices, targets);
    }

    async updateTargets(team: string, input: unknown): Promise<TeamTargets> {
        return this.targets.update(team, input);
    }

    /**
     * First `limit` rows of one raw table.
     * @throws PulseboardRuntimeError (NOT_FOUND) for an unknown table name
     */
    async rawTable(
        table: string,
        limit?: number
    ): Promise<Deal[] | TimeEntry[] | Invoice[]> {
        if (!isRawTable(table)) {
            throw ReportError.unknownTable(table, RAW_TABLES);
        }
        const dataset = await this.getDataset();
        switch (table) {
            case 'deals':
                return previewRows(dataset.deals, limit);
            case 'time-entries':
                return previewRows(dataset.timeEntries, limit);
            case 'invoices':
                return previewRows(dataset.invoices, limit);
        }
    }

    private async load(): Promise<Dataset> {
        if (this.pending) {
            return this.pending;
        }
        this.pending = this.loader
            .loadData()
            .then((dataset) => {
                this.dataset = dataset;
                logger.info(
                    `Dataset ready (${dataset.source}): ${dataset.deals.length} deals, ${dataset.timeEntries.length} time entries, ${dataset.invoices.length} invoices`
                );
                return dataset;
            })
            .catch((error: unknown) => {
                throw ReportError.datasetLoadFailed(
                    error instanceof Error ? error.message : String(error)
                );
            })
            .finally(() => {
                this.pending = null;
            });
        return this.pending;
    }
}
