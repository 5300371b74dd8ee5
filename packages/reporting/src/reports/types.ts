import type { Deal, DataSource } from '@pulseboard/core';

export interface MonthlyBillingRow {
    /** `YYYY-MM` */
    month: string;
    totalBilled: number;
    amountCollected: number;
    outstanding: number;
}

export interface YearlyBillingRow {
    year: number;
    totalBilled: number;
    amountCollected: number;
    outstanding: number;
}

export interface TeamTimeRow {
    team: string;
    hours: number;
    billableAmount: number;
}

export interface DealProfitRow extends Deal {
    profit: number;
    profitMarginPct: number;
}

export interface ScorecardRow {
    team: string;
    revenue: number;
    profit: number;
    profitabilityPct: number;
    hours: number;
    collectedEstimate: number;
    revenueVsTargetPct: number;
    collectionVsTargetPct: number;
    utilizationVsTargetPct: number;
    profitabilityVsTargetPct: number;
}

export interface Summary {
    totalBilled: number;
    moneyCollected: number;
    totalHours: number;
    averageDealMargin: number;
    source: DataSource;
    loadedAt: string;
    fallbackReason?: string;
}
