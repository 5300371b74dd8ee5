import { describe, it, expect } from 'vitest';
import { monthlyBilling, yearlyBilling } from './billing.js';
import { invoice } from './test-fixtures.js';

const invoices = [
    invoice({ date: '2024-01-15', total: 1000, amountPaid: 600, amountDue: 400 }),
    invoice({ date: '2024-01-31', total: 500, amountPaid: 500, amountDue: 0 }),
    invoice({ date: '2023-12-05', total: 200, amountPaid: 0, amountDue: 200 }),
    invoice({ date: null, total: 999, amountPaid: 999, amountDue: 0 }),
];

describe('monthlyBilling', () => {
    it('sums each month and sorts oldest first', () => {
        expect(monthlyBilling(invoices)).toEqual([
            { month: '2023-12', totalBilled: 200, amountCollected: 0, outstanding: 200 },
            { month: '2024-01', totalBilled: 1500, amountCollected: 1100, outstanding: 400 },
        ]);
    });

    it('returns nothing for no invoices', () => {
        expect(monthlyBilling([])).toEqual([]);
    });
});

describe('yearlyBilling', () => {
    it('sums each calendar year and skips undated invoices', () => {
        expect(yearlyBilling(invoices)).toEqual([
            { year: 2023, totalBilled: 200, amountCollected: 0, outstanding: 200 },
            { year: 2024, totalBilled: 1500, amountCollected: 1100, outstanding: 400 },
        ]);
    });
});
