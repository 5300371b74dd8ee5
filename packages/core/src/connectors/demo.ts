import { addDays, roundTo, toIsoDate } from '../data/coerce.js';
import type { Deal, Invoice, TimeEntry } from '../data/types.js';
import { createSeededRandom } from './random.js';

export const DEMO_TEAMS = ['Growth', 'Delivery', 'Operations', 'Customer Success'] as const;
export const DEMO_CLIENTS = ['Acme', 'Globex', 'Initech', 'Umbrella', 'Stark'] as const;
export const DEMO_SEED = 7;

const DEAL_COUNT = 100;
const TIME_ENTRY_COUNT = 2000;
const INVOICE_COUNT = 300;
const DAYS_OF_HISTORY = 365;
const PAYMENT_TERMS_DAYS = 30;

export interface DemoOptions {
    seed?: number;
    /** Last day of the generated history */
    referenceDate?: Date;
}

export interface DemoData {
    deals: Deal[];
    timeEntries: TimeEntry[];
    invoices: Invoice[];
}

/**
 * Generate a year of plausible deals, time entries and invoices.
 * Same seed and reference date always give the same rows.
 */
export function generateDemoData(options: DemoOptions = {}): DemoData {
    const rng = createSeededRandom(options.seed ?? DEMO_SEED);
    const end = toIsoDate(options.referenceDate ?? new Date());
    const dates = Array.from({ length: DAYS_OF_HISTORY }, (_, i) =>
        addDays(end, i - (DAYS_OF_HISTORY - 1))
    );

    const deals: Deal[] = Array.from({ length: DEAL_COUNT }, (_, i) => ({
        dealName: `Deal-${i + 1}`,
        team: rng.choice(DEMO_TEAMS),
        closeDate: rng.choice(dates),
        dealValue: rng.integer(8000, 120000),
        costToDeliver: rng.integer(3000, 70000),
    }));

    const timeEntries: TimeEntry[] = Array.from({ length: TIME_ENTRY_COUNT }, (_, i) => {
        const hours = roundTo(rng.uniform(0.5, 8.0));
        return {
            date: rng.choice(dates),
            team: rng.choice(DEMO_TEAMS),
            project: `Project-${i % 40}`,
            client: rng.choice(DEMO_CLIENTS),
            hours,
            billable: rng.weightedChoice([true, false], [0.8, 0.2]),
            billableAmount: roundTo(hours * rng.uniform(80, 220)),
        };
    });

    const invoices: Invoice[] = Array.from({ length: INVOICE_COUNT }, (_, i) => {
        const date = rng.choice(dates);
        const total = rng.integer(2000, 65000);
        const amountPaid = roundTo(total * rng.uniform(0.65, 1.0));
        return {
            invoiceNumber: `INV-${1000 + i}`,
            contact: rng.choice(DEMO_CLIENTS),
            status: rng.weightedChoice(['PAID', 'AUTHORISED', 'SUBMITTED'], [0.7, 0.2, 0.1]),
            date,
            dueDate: addDays(date, PAYMENT_TERMS_DAYS),
            total,
            amountPaid,
            amountDue: roundTo(total - amountPaid),
        };
    });

    return { deals, timeEntries, invoices };
}
