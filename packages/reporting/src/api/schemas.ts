import { z } from 'zod';
import { TeamTargetsSchema } from '../targets/schemas.js';

/**
 * Request and response schemas for the reporting API.
 */

export const DataSourceSchema = z.enum(['live', 'demo']);

export const HealthResponseSchema = z.object({
    ok: z.boolean(),
    source: DataSourceSchema,
    loadedAt: z.string().describe('ISO timestamp of the last dataset load'),
    counts: z.object({
        deals: z.number(),
        timeEntries: z.number(),
        invoices: z.number(),
    }),
});

export const SummarySchema = z.object({
    totalBilled: z.number(),
    moneyCollected: z.number(),
    totalHours: z.number(),
    averageDealMargin: z.number().describe('Mean deal margin in percent'),
    source: DataSourceSchema,
    loadedAt: z.string(),
    fallbackReason: z.string().optional().describe('Why demo data is being served'),
});

const BillingTotalsSchema = z.object({
    totalBilled: z.number(),
    amountCollected: z.number(),
    outstanding: z.number(),
});

export const MonthlyBillingRowSchema = BillingTotalsSchema.extend({
    month: z.string().describe('YYYY-MM'),
});

export const YearlyBillingRowSchema = BillingTotalsSchema.extend({
    year: z.number(),
});

export const BillingQuerySchema = z.object({
    period: z.enum(['month', 'year']).default('month').describe('Grouping period'),
});

export const TeamTimeRowSchema = z.object({
    team: z.string(),
    hours: z.number(),
    billableAmount: z.number(),
});

export const DealSchema = z.object({
    dealName: z.string(),
    team: z.string(),
    closeDate: z.string().nullable(),
    dealValue: z.number(),
    costToDeliver: z.number(),
});

export const TimeEntrySchema = z.object({
    date: z.string().nullable(),
    team: z.string(),
    project: z.string(),
    client: z.string(),
    hours: z.number(),
    billable: z.boolean(),
    billableAmount: z.number(),
});

export const InvoiceSchema = z.object({
    invoiceNumber: z.string().nullable(),
    contact: z.string(),
    status: z.string(),
    date: z.string().nullable(),
    dueDate: z.string().nullable(),
    amountDue: z.number(),
    amountPaid: z.number(),
    total: z.number(),
});

export const RawRowsSchema = z.union([
    z.array(DealSchema),
    z.array(TimeEntrySchema),
    z.array(InvoiceSchema),
]);

export const DealProfitRowSchema = DealSchema.extend({
    profit: z.number(),
    profitMarginPct: z.number(),
});

export const ScorecardRowSchema = z.object({
    team: z.string(),
    revenue: z.number(),
    profit: z.number(),
    profitabilityPct: z.number(),
    hours: z.number(),
    collectedEstimate: z.number(),
    revenueVsTargetPct: z.number(),
    collectionVsTargetPct: z.number(),
    utilizationVsTargetPct: z.number(),
    profitabilityVsTargetPct: z.number(),
});

export const TargetsMapSchema = z.record(z.string(), TeamTargetsSchema);

export const TeamParamSchema = z.object({
    team: z
        .string()
        .min(1)
        .refine((team) => team !== '__proto__', 'Team name is reserved')
        .describe('Team name'),
});

export const RawTableParamSchema = z.object({
    table: z.string().describe('deals, time-entries or invoices'),
});

export const RawTableQuerySchema = z.object({
    limit: z.coerce
        .number()
        .int()
        .nonnegative()
        .max(10_000)
        .default(100)
        .describe('Rows to return'),
});

export function okResponse<T extends z.ZodTypeAny>(data: T) {
    return z.object({ ok: z.boolean(), data });
}

export type HealthResponse = z.output<typeof HealthResponseSchema>;
