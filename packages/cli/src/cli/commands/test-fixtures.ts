import type { Dataset } from '@pulseboard/core';
import type { DatasetLoader } from '@pulseboard/reporting';

export const smallDataset: Dataset = {
    deals: [
        {
            dealName: 'Deal-1',
            team: 'Growth',
            closeDate: '2024-01-10',
            dealValue: 1000,
            costToDeliver: 600,
        },
        {
            dealName: 'Deal-2',
            team: 'Delivery',
            closeDate: '2024-02-01',
            dealValue: 2000,
            costToDeliver: 500,
        },
    ],
    timeEntries: [
        {
            date: '2024-01-11',
            team: 'Growth',
            project: 'Project-1',
            client: 'Acme',
            hours: 10,
            billable: true,
            billableAmount: 1000,
        },
    ],
    invoices: [
        {
            invoiceNumber: 'INV-1000',
            contact: 'Acme',
            status: 'AUTHORISED',
            date: '2024-01-15',
            dueDate: '2024-02-14',
            amountDue: 400,
            amountPaid: 600,
            total: 1000,
        },
    ],
    source: 'demo',
    loadedAt: '2024-06-30T12:00:00.000Z',
    fallbackReason: 'credentials missing',
};

export const smallLoader: DatasetLoader = {
    loadData: async () => smallDataset,
};
