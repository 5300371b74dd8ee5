import { z } from 'zod';
import { logger } from '../logger/index.js';
import { addDays, parseDate, toIsoDate, toNumber } from '../data/coerce.js';
import { UNKNOWN, type TimeEntry } from '../data/types.js';
import { requestJson, type FetchFn } from './http.js';

export const HARVEST_API_URL = 'https://api.harvestapp.com/v2/time_entries';
export const HARVEST_USER_AGENT = 'analytics-dashboard-tool';
export const HARVEST_PAGE_SIZE = 200;
export const HARVEST_LOOKBACK_DAYS = 365;

const NamedRef = z.object({ name: z.string().nullable().optional() }).nullable().optional();

const HarvestEntrySchema = z.object({
    spent_date: z.string().nullable().optional(),
    user: NamedRef,
    project: NamedRef,
    client: NamedRef,
    hours: z.number().nullable().optional(),
    billable: z.boolean().nullable().optional(),
    billable_rate: z.number().nullable().optional(),
});

const HarvestResponseSchema = z.object({
    time_entries: z.array(HarvestEntrySchema).default([]),
});

export type HarvestEntry = z.infer<typeof HarvestEntrySchema>;

export interface HarvestClientOptions {
    token: string;
    accountId?: string;
    timeoutMs: number;
    fetch?: FetchFn;
    now?: () => Date;
}

/**
 * Harvest has no team concept on time entries; the person who logged the time stands in for it.
 */
export function mapHarvestEntry(entry: HarvestEntry): TimeEntry {
    const hours = toNumber(entry.hours);
    return {
        date: parseDate(entry.spent_date),
        team: entry.user?.name ?? UNKNOWN,
        project: entry.project?.name ?? UNKNOWN,
        client: entry.client?.name ?? UNKNOWN,
        hours,
        billable: entry.billable ?? false,
        billableAmount: toNumber(entry.billable_rate) * hours,
    };
}

export class HarvestClient {
    constructor(private readonly options: HarvestClientOptions) {}

    /**
     * Fetch the first page of time entries for the trailing year.
     */
    async fetchTimeEntries(): Promise<TimeEntry[]> {
        const today = toIsoDate(this.options.now?.() ?? new Date());
        const url = new URL(HARVEST_API_URL);
        url.searchParams.set('from', addDays(today, -HARVEST_LOOKBACK_DAYS));
        url.searchParams.set('to', today);
        url.searchParams.set('per_page', String(HARVEST_PAGE_SIZE));

        const response = await requestJson(
            'harvest',
            url,
            {
                method: 'GET',
                headers: {
                    Authorization: `Bearer ${this.options.token}`,
                    'Harvest-Account-ID': this.options.accountId ?? '',
                    'User-Agent': HARVEST_USER_AGENT,
                },
            },
            HarvestResponseSchema,
            { timeoutMs: this.options.timeoutMs, fetch: this.options.fetch }
        );

        const entries = response.time_entries.map(mapHarvestEntry);
        logger.debug(`harvest: loaded ${entries.length} time entries`);
        return entries;
    }
}
