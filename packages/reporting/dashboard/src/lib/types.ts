/**
 * Shapes returned by the reporting API.
 */
export type { Deal, Invoice, TimeEntry } from '@pulseboard/core';
export type {
    DealProfitRow,
    MonthlyBillingRow,
    ScorecardRow,
    Summary,
    TeamTimeRow,
    YearlyBillingRow,
} from '../../../src/reports/types.js';
export type { TeamTargets, TeamTargetsUpdate } from '../../../src/targets/schemas.js';
export type { DatasetStatus, RawTable } from '../../../src/api/report-service.js';

export interface ApiResponse<T> {
    ok: boolean;
    data: T;
}

export interface HealthStatus {
    ok: boolean;
    source: 'live' | 'demo';
    loadedAt: string;
    counts: { deals: number; timeEntries: number; invoices: number };
}

export interface BillingResponse<Row> {
    period: 'month' | 'year';
    rows: Row[];
}

export interface ApiErrorBody {
    code: string;
    message: string;
}
