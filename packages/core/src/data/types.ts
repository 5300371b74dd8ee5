/**
 * Row types shared by connectors, reports and the dashboard API.
 * Dates are ISO calendar dates (`YYYY-MM-DD`); `null` when the source value could not be parsed.
 */

export interface Deal {
    dealName: string;
    team: string;
    closeDate: string | null;
    dealValue: number;
    costToDeliver: number;
}

export interface TimeEntry {
    date: string | null;
    team: string;
    project: string;
    client: string;
    hours: number;
    billable: boolean;
    billableAmount: number;
}

export type InvoiceStatus = 'PAID' | 'AUTHORISED' | 'SUBMITTED' | 'DRAFT' | 'VOIDED' | string;

export interface Invoice {
    invoiceNumber: string | null;
    contact: string;
    status: InvoiceStatus;
    date: string | null;
    dueDate: string | null;
    amountDue: number;
    amountPaid: number;
    total: number;
}

export type DataSource = 'live' | 'demo';

export interface Dataset {
    deals: Deal[];
    timeEntries: TimeEntry[];
    invoices: Invoice[];
    source: DataSource;
    /** ISO timestamp of when the dataset was assembled */
    loadedAt: string;
    /** Why live loading was skipped or abandoned, when source is 'demo' */
    fallbackReason?: string;
}

export const UNKNOWN = 'Unknown';
