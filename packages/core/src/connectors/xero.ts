import { z } from 'zod';
import { logger } from '../logger/index.js';
import { parseDate, toNumber } from '../data/coerce.js';
import { UNKNOWN, type Invoice } from '../data/types.js';
import { requestJson, type FetchFn } from './http.js';

export const XERO_INVOICES_URL = 'https://api.xero.com/api.xro/2.0/Invoices';

const XeroInvoiceSchema = z.object({
    InvoiceNumber: z.string().nullable().optional(),
    Contact: z
        .object({ Name: z.string().nullable().optional() })
        .nullable()
        .optional(),
    Status: z.string().nullable().optional(),
    DateString: z.string().nullable().optional(),
    DueDateString: z.string().nullable().optional(),
    AmountDue: z.number().nullable().optional(),
    AmountPaid: z.number().nullable().optional(),
    Total: z.number().nullable().optional(),
});

const XeroResponseSchema = z.object({
    Invoices: z.array(XeroInvoiceSchema).default([]),
});

export type XeroInvoice = z.infer<typeof XeroInvoiceSchema>;

export interface XeroClientOptions {
    token: string;
    tenantId?: string;
    timeoutMs: number;
    fetch?: FetchFn;
}

export function mapXeroInvoice(invoice: XeroInvoice): Invoice {
    return {
        invoiceNumber: invoice.InvoiceNumber ?? null,
        contact: invoice.Contact?.Name ?? UNKNOWN,
        status: invoice.Status ?? UNKNOWN,
        date: parseDate(invoice.DateString),
        dueDate: parseDate(invoice.DueDateString),
        amountDue: toNumber(invoice.AmountDue),
        amountPaid: toNumber(invoice.AmountPaid),
        total: toNumber(invoice.Total),
    };
}

export class XeroClient {
    constructor(private readonly options: XeroClientOptions) {}

    async fetchInvoices(): Promise<Invoice[]> {
        const response = await requestJson(
            'xero',
            XERO_INVOICES_URL,
            {
                method: 'GET',
                headers: {
                    Authorization: `Bearer ${this.options.token}`,
                    'Xero-tenant-id': this.options.tenantId ?? '',
                    Accept: 'application/json',
                },
            },
            XeroResponseSchema,
            { timeoutMs: this.options.timeoutMs, fetch: this.options.fetch }
        );

        const invoices = response.Invoices.map(mapXeroInvoice);
        logger.debug(`xero: loaded ${invoices.length} invoices`);
        return invoices;
    }
}
