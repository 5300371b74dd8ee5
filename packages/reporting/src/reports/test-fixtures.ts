import type { Deal, Invoice, TimeEntry } from '@pulseboard/core';

export function deal(overrides: Partial<Deal> = {}): Deal {
    return {
        dealName: 'Deal',
        team: 'Growth',
        closeDate: '2024-01-10',
        dealValue: 0,
        costToDeliver: 0,
        ...overrides,
    };
}

export function timeEntry(overrides: Partial<TimeEntry> = {}): TimeEntry {
    return {
        date: '2024-01-10',
        team: 'Growth',
        project: 'Project-1',
        client: 'Acme',
        hours: 0,
        billable: true,
        billableAmount: 0,
        ...overrides,
    };
}

export function invoice(overrides: Partial<Invoice> = {}): Invoice {
    return {
        invoiceNumber: 'INV-1',
        contact: 'Acme',
        status: 'PAID',
        date: '2024-01-10',
        dueDate: '2024-02-09',
        amountDue: 0,
        amountPaid: 0,
        total: 0,
        ...overrides,
    };
}
