import { describe, it, expect, vi } from 'vitest';
import { DataConnector } from './data-connector.js';
import { loadConnectorConfig } from '../config/loader.js';
import type { FetchFn } from './http.js';
import { jsonResponse } from './test-helpers.js';

const now = () => new Date('2024-06-30T12:00:00Z');

const liveConfig = loadConnectorConfig({
    MONDAY_API_TOKEN: 'monday-test-secret',
    HARVEST_API_TOKEN: 'harvest-test-secret',
    HARVEST_ACCOUNT_ID: '1001',
    XERO_ACCESS_TOKEN: 'xero-test-secret',
    XERO_TENANT_ID: 'tenant-1',
});

function routedFetch(overrides: { xeroStatus?: number } = {}): FetchFn {
    return async (input) => {
        const url = String(input);
        if (url.startsWith('https://api.monday.com')) {
            return jsonResponse({
                data: {
                    boards: [
                        {
                            items_page: {
                                items: [
                                    {
                                        name: 'Deal A',
                                        column_values: [{ id: 'team', text: 'Growth' }],
                                    },
                                ],
                            },
                        },
                    ],
                },
            });
        }
        if (url.startsWith('https://api.harvestapp.com')) {
            return jsonResponse({
                time_entries: [{ spent_date: '2024-06-01', hours: 2 }, { hours: 1 }],
            });
        }
        if (overrides.xeroStatus !== undefined) {
            return new Response('unavailable', { status: overrides.xeroStatus });
        }
        return jsonResponse({ Invoices: [{ InvoiceNumber: 'INV-1', Total: 100 }] });
    };
}

describe('DataConnector', () => {
    it('serves demo data without calling out when credentials are missing', async () => {
        const fetchMock = vi.fn<FetchFn>(routedFetch());
        const connector = new DataConnector({
            config: loadConnectorConfig({ MONDAY_API_TOKEN: 'monday-test-secret' }),
            fetch: fetchMock,
            now,
        });

        const dataset = await connector.loadData();

        expect(fetchMock).not.toHaveBeenCalled();
        expect(dataset.source).toBe('demo');
        expect(dataset.fallbackReason).toBe(
            'credentials for monday.com, Harvest and Xero are not all set'
        );
        expect(dataset.deals).toHaveLength(100);
        expect(dataset.loadedAt).toBe('2024-06-30T12:00:00.000Z');
    });

    it('loads all three sources when credentials are present', async () => {
        const fetchMock = vi.fn<FetchFn>(routedFetch());
        const connector = new DataConnector({ config: liveConfig, fetch: fetchMock, now });

        const dataset = await connector.loadData();

        expect(fetchMock).toHaveBeenCalledTimes(3);
        expect(dataset.source).toBe('live');
        expect(dataset.fallbackReason).toBeUndefined();
        expect(dataset.deals.map((deal) => deal.team)).toEqual(['Growth']);
        expect(dataset.timeEntries).toHaveLength(2);
        expect(dataset.invoices.map((invoice) => invoice.invoiceNumber)).toEqual(['INV-1']);
    });

    it('falls back to demo data when any source fails', async () => {
        const connector = new DataConnector({
            config: liveConfig,
            fetch: routedFetch({ xeroStatus: 503 }),
            now,
        });

        const dataset = await connector.loadData();

        expect(dataset.source).toBe('demo');
        expect(dataset.fallbackReason).toBe('xero request failed with HTTP 503');
        expect(dataset.invoices).toHaveLength(300);
    });
});
